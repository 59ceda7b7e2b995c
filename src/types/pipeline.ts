/**
 * Core records that flow through the fetch -> score -> publish -> aggregate pipeline.
 */

export const METRIC_NAMES = [
  'Revenue Growth',
  'EPS',
  'Net Profit Margin',
  'Operating Margin',
  'Return on Equity',
  'Earnings Growth Rate',
  'Free Cash Flow',
  'Operating Cash Flow',
  'Debt-to-Equity Ratio',
  'Current Ratio',
  'P/E Ratio',
  'PEG Ratio',
  'P/B Ratio',
  'Dividend Yield',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** null = unknown, which is not the same as 0 */
export type MetricValues = Record<MetricName, number | null>;

/** Where a Fundamentals record came from. */
export type Provenance = 'primary' | 'secondary' | 'synthetic';

export interface StockRecord {
  symbol: string;
  sector: string;
}

export interface Fundamentals {
  symbol: string;
  provenance: Provenance;
  metrics: MetricValues;
}

export interface FetchedStock {
  sector: string;
  fundamentals: Fundamentals;
}

export interface ChunkJob {
  chunkId: string;
  runId: string;
  stocks: StockRecord[];
}

export interface ScoreResult {
  buyScore: number;
  reasons: string[];
}

export interface RankedRow {
  symbol: string;
  sector: string;
  buyScore: number;
  reasonsToBuy: string;
  provenance: Provenance;
}

export const DEFAULT_SECTOR = 'Unknown';

const BLANK_METRICS: MetricValues = {
  'Revenue Growth': null,
  EPS: null,
  'Net Profit Margin': null,
  'Operating Margin': null,
  'Return on Equity': null,
  'Earnings Growth Rate': null,
  'Free Cash Flow': null,
  'Operating Cash Flow': null,
  'Debt-to-Equity Ratio': null,
  'Current Ratio': null,
  'P/E Ratio': null,
  'PEG Ratio': null,
  'P/B Ratio': null,
  'Dividend Yield': null,
};

export function emptyMetrics(): MetricValues {
  return { ...BLANK_METRICS };
}
