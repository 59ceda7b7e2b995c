/**
 * quoteSummary response shapes (only the modules the mapper reads)
 */

export interface YahooNumber {
  raw?: number;
  fmt?: string;
}

export type YahooValue = YahooNumber | number | null | undefined;

export interface YahooFinancialData {
  revenueGrowth?: YahooValue;
  earningsGrowth?: YahooValue;
  profitMargins?: YahooValue;
  operatingMargins?: YahooValue;
  returnOnEquity?: YahooValue;
  freeCashflow?: YahooValue;
  operatingCashflow?: YahooValue;
  debtToEquity?: YahooValue;
  currentRatio?: YahooValue;
}

export interface YahooKeyStatistics {
  trailingEps?: YahooValue;
  forwardEps?: YahooValue;
  forwardPE?: YahooValue;
  pegRatio?: YahooValue;
  priceToBook?: YahooValue;
  profitMargins?: YahooValue;
  earningsQuarterlyGrowth?: YahooValue;
}

export interface YahooSummaryDetail {
  trailingPE?: YahooValue;
  forwardPE?: YahooValue;
  dividendYield?: YahooValue;
}

export interface YahooQuoteSummaryResult {
  financialData?: YahooFinancialData;
  defaultKeyStatistics?: YahooKeyStatistics;
  summaryDetail?: YahooSummaryDetail;
}

export interface YahooQuoteSummaryResponse {
  quoteSummary?: {
    result?: YahooQuoteSummaryResult[] | null;
    error?: { code?: string; description?: string } | null;
  };
}
