/**
 * Secondary fundamentals source backed by the Alpha Vantage OVERVIEW endpoint.
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
import type { AlphaVantageOverview } from './types';

const logger = createChildLogger('alpha_vantage');

const BASE_URL = 'https://www.alphavantage.co/query';
const MISSING_MARKERS = new Set(['', 'none', '-', 'null', 'n/a']);

export function safeFloat(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (MISSING_MARKERS.has(trimmed.toLowerCase())) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/** "12.5%" -> 0.125; plain decimals pass through. */
export function safePercentage(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed.endsWith('%')) {
    const parsed = safeFloat(trimmed.slice(0, -1));
    return parsed === null ? null : parsed / 100;
  }
  return safeFloat(trimmed);
}

export function mapOverview(overview: AlphaVantageOverview): SourcePayload {
  const metrics: MetricValues = {
    ...emptyMetrics(),
    'Revenue Growth': safePercentage(overview.QuarterlyRevenueGrowthYOY),
    EPS: safeFloat(overview.EPS),
    'Net Profit Margin': safePercentage(overview.ProfitMargin),
    'Operating Margin': safePercentage(overview.OperatingMarginTTM),
    'Return on Equity': safePercentage(overview.ReturnOnEquityTTM),
    'Earnings Growth Rate': safePercentage(overview.QuarterlyEarningsGrowthYOY),
    'P/E Ratio': safeFloat(overview.PERatio),
    'PEG Ratio': safeFloat(overview.PEGRatio),
    'P/B Ratio': safeFloat(overview.PriceToBookRatio),
    'Dividend Yield': safePercentage(overview.DividendYield),
  };
  const rawFieldCount = Object.values(overview).filter(
    (value) => typeof value === 'string' && !MISSING_MARKERS.has(value.trim().toLowerCase())
  ).length;
  return { metrics, rawFieldCount };
}

export class AlphaVantageClient implements FundamentalsSource {
  readonly name = 'alpha_vantage';

  constructor(
    private readonly apiKey: string,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async getFundamentals(symbol: string, signal?: AbortSignal): Promise<SourcePayload> {
    const url = `${BASE_URL}?function=OVERVIEW&symbol=${encodeURIComponent(
      symbol
    )}&apikey=${encodeURIComponent(this.apiKey)}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, { signal });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(
        `OVERVIEW request failed: ${cause.message}`,
        this.name,
        symbol,
        'getFundamentals',
        classifyProviderError(error),
        cause
      );
    }

    if (!response.ok) {
      throw new ProviderError(
        `OVERVIEW returned HTTP ${response.status}`,
        this.name,
        symbol,
        'getFundamentals',
        kindForHttpStatus(response.status)
      );
    }

    const body: AlphaVantageOverview = await response.json();
    if (body['Error Message']) {
      throw new ProviderError(body['Error Message'], this.name, symbol, 'getFundamentals', 'fatal');
    }
    const notice = body.Note ?? body.Information;
    if (notice) {
      logger.debug({ symbol, notice }, 'Alpha Vantage throttled the request');
      throw new ProviderError(notice, this.name, symbol, 'getFundamentals', 'rate_limited');
    }
    if (!body.Symbol) {
      throw new ProviderError(
        'OVERVIEW payload has no symbol',
        this.name,
        symbol,
        'getFundamentals',
        'insufficient'
      );
    }

    return mapOverview(body);
  }
}
