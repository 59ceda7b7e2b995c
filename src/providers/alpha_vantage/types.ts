/**
 * OVERVIEW endpoint response. Every value arrives as a string; "None" and "-"
 * mark missing data.
 */
export interface AlphaVantageOverview {
  Symbol?: string;
  Sector?: string;
  QuarterlyRevenueGrowthYOY?: string;
  EPS?: string;
  ProfitMargin?: string;
  OperatingMarginTTM?: string;
  ReturnOnEquityTTM?: string;
  QuarterlyEarningsGrowthYOY?: string;
  PERatio?: string;
  PEGRatio?: string;
  PriceToBookRatio?: string;
  DividendYield?: string;
  'Error Message'?: string;
  Note?: string;
  Information?: string;
}
