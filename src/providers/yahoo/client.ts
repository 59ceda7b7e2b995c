/**
 * Primary fundamentals source: quoteSummary over HTTP.
 * One request per call; retries and fallback belong to the fetcher.
 */

import { createChildLogger } from '@/utils/logger';
import { emptyMetrics, type MetricValues } from '@/types/pipeline';
import {
  ProviderError,
  classifyProviderError,
  kindForHttpStatus,
  type FundamentalsSource,
  type SourcePayload,
} from '../types';
import { ACCEPT_LANGUAGE, USER_AGENT, YahooSessionManager } from './session';
import type {
  YahooQuoteSummaryResponse,
  YahooQuoteSummaryResult,
  YahooValue,
} from './types';

const logger = createChildLogger('yahoo');

const MODULES = 'financialData,defaultKeyStatistics,summaryDetail';
const HOSTS = ['query2', 'query1'];

export function readYahooNumber(value: YahooValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (value && typeof value.raw === 'number' && Number.isFinite(value.raw)) {
    return value.raw;
  }
  return null;
}

function countPopulated(module: object | undefined): number {
  if (!module) return 0;
  const values: unknown[] = Object.values(module);
  return values.filter((value) => {
    if (typeof value === 'number') return Number.isFinite(value);
    if (typeof value === 'string') return value.length > 0;
    if (value && typeof value === 'object') return Object.keys(value).length > 0;
    return false;
  }).length;
}

export function mapQuoteSummary(result: YahooQuoteSummaryResult): SourcePayload {
  const financial = result.financialData ?? {};
  const stats = result.defaultKeyStatistics ?? {};
  const summary = result.summaryDetail ?? {};

  const metrics: MetricValues = {
    ...emptyMetrics(),
    'Revenue Growth': readYahooNumber(financial.revenueGrowth),
    EPS: readYahooNumber(stats.trailingEps) ?? readYahooNumber(stats.forwardEps),
    'Net Profit Margin':
      readYahooNumber(financial.profitMargins) ?? readYahooNumber(stats.profitMargins),
    'Operating Margin': readYahooNumber(financial.operatingMargins),
    'Return on Equity': readYahooNumber(financial.returnOnEquity),
    'Earnings Growth Rate':
      readYahooNumber(stats.earningsQuarterlyGrowth) ?? readYahooNumber(financial.earningsGrowth),
    'Free Cash Flow': readYahooNumber(financial.freeCashflow),
    'Operating Cash Flow': readYahooNumber(financial.operatingCashflow),
    'Debt-to-Equity Ratio': readYahooNumber(financial.debtToEquity),
    'Current Ratio': readYahooNumber(financial.currentRatio),
    'P/E Ratio':
      readYahooNumber(summary.trailingPE) ??
      readYahooNumber(summary.forwardPE) ??
      readYahooNumber(stats.forwardPE),
    'PEG Ratio': readYahooNumber(stats.pegRatio),
    'P/B Ratio': readYahooNumber(stats.priceToBook),
    'Dividend Yield': readYahooNumber(summary.dividendYield),
  };

  return {
    metrics,
    rawFieldCount:
      countPopulated(result.financialData) +
      countPopulated(result.defaultKeyStatistics) +
      countPopulated(result.summaryDetail),
  };
}

export class YahooQuoteSummaryClient implements FundamentalsSource {
  readonly name = 'yahoo';

  constructor(
    private readonly sessions: YahooSessionManager = new YahooSessionManager(),
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async getFundamentals(symbol: string, signal?: AbortSignal): Promise<SourcePayload> {
    try {
      return await this.fetchQuoteSummary(symbol, signal, true);
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(
        `quoteSummary request failed: ${cause.message}`,
        this.name,
        symbol,
        'getFundamentals',
        classifyProviderError(error),
        cause
      );
    }
  }

  private async fetchQuoteSummary(
    symbol: string,
    signal: AbortSignal | undefined,
    refreshOnUnauthorized: boolean
  ): Promise<SourcePayload> {
    const session = await this.sessions.get(signal);
    const crumb = session.crumb ? `&crumb=${encodeURIComponent(session.crumb)}` : '';
    const headers = {
      'User-Agent': USER_AGENT,
      'Accept-Language': ACCEPT_LANGUAGE,
      Accept: 'application/json, text/plain, */*',
      Cookie: session.cookie,
    };

    let lastStatus = 0;
    for (const host of HOSTS) {
      const url = `https://${host}.finance.yahoo.com/v10/finance/quoteSummary/${encodeURIComponent(
        symbol
      )}?modules=${MODULES}${crumb}`;
      const response = await this.fetchFn(url, { headers, signal });

      if (response.status === 401 && refreshOnUnauthorized) {
        logger.debug({ symbol }, 'Session rejected, refreshing');
        this.sessions.invalidate();
        return this.fetchQuoteSummary(symbol, signal, false);
      }

      if (response.status === 429) {
        throw new ProviderError(
          'quoteSummary rate limited (429)',
          this.name,
          symbol,
          'getFundamentals',
          'rate_limited'
        );
      }

      if (!response.ok) {
        lastStatus = response.status;
        continue;
      }

      const body: YahooQuoteSummaryResponse = await response.json();
      const result = body.quoteSummary?.result?.[0];
      if (result) {
        return mapQuoteSummary(result);
      }
      lastStatus = response.status;
    }

    throw new ProviderError(
      `quoteSummary unavailable (status ${lastStatus})`,
      this.name,
      symbol,
      'getFundamentals',
      lastStatus === 200 ? 'insufficient' : kindForHttpStatus(lastStatus)
    );
  }
}
