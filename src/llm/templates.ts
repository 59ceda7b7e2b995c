/**
 * Prompt templates for the scoring oracle.
 */

import { METRIC_NAMES, type Fundamentals } from '@/types/pipeline';

export const PROMPT_VERSION = '1.0.0';

export function formatMetricValue(value: number | null): string {
  return value === null || !Number.isFinite(value) ? 'N/A' : String(value);
}

export function formatFundamentalsStanza(fundamentals: Fundamentals): string {
  const lines = [`${fundamentals.symbol}:`, `  Data source: ${fundamentals.provenance}`];
  for (const metric of METRIC_NAMES) {
    lines.push(`  ${metric}: ${formatMetricValue(fundamentals.metrics[metric])}`);
  }
  return lines.join('\n');
}

export function formatFundamentalsBlock(entries: Fundamentals[]): string {
  return entries.map(formatFundamentalsStanza).join('\n\n');
}

export function buildScoringPrompt(block: string): string {
  return [
    'You are an equity analyst. Score each stock below on how attractive it is as a buy today,',
    'using only the fundamentals given. "N/A" means the value is unknown, not zero.',
    'Stocks whose data source is "synthetic" carry placeholder numbers; weigh them cautiously.',
    '',
    'Return ONLY a JSON object keyed by ticker symbol, with no commentary:',
    '{"SYMBOL": {"BuyScore": <integer 0-10>, "ReasonsToBuy": ["short reason", "..."]}}',
    '',
    'Fundamentals:',
    '',
    block,
  ].join('\n');
}
