import { isEligibleForScoring } from '@/pipeline/filters';
import type { FetchedStock, RankedRow, ScoreResult } from '@/types/pipeline';

export const REASON_SEPARATOR = '; ';

function compareSymbols(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Descending BuyScore, ties by symbol ascending, truncated to `k`. */
export function rankRows(rows: RankedRow[], k: number): RankedRow[] {
  return rows
    .slice()
    .sort((a, b) => {
      if (b.buyScore !== a.buyScore) return b.buyScore - a.buyScore;
      return compareSymbols(a.symbol, b.symbol);
    })
    .slice(0, k);
}

/**
 * Joins fetched fundamentals with scores. Only symbols present in both maps
 * and still eligible become rows; input order is kept.
 */
export function buildRankedRows(
  fetched: Map<string, FetchedStock>,
  scores: Map<string, ScoreResult>
): RankedRow[] {
  const rows: RankedRow[] = [];
  for (const [symbol, stock] of fetched) {
    const score = scores.get(symbol);
    if (!score || !isEligibleForScoring(stock.fundamentals)) continue;
    rows.push({
      symbol,
      sector: stock.sector,
      buyScore: score.buyScore,
      reasonsToBuy: score.reasons.join(REASON_SEPARATOR),
      provenance: stock.fundamentals.provenance,
    });
  }
  return rows;
}
