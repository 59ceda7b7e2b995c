/**
 * CSV rendering for the ranked output attachment.
 */

import type { RankedRow } from '@/types/pipeline';

export const CSV_HEADER = ['Symbol', 'Sector', 'BuyScore', 'ReasonsToBuy'] as const;

export interface CsvOptions {
  includeProvenance?: boolean;
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function renderCsv(rows: RankedRow[], options: CsvOptions = {}): string {
  const header: string[] = [...CSV_HEADER];
  if (options.includeProvenance) header.push('Provenance');

  const lines = [header.join(',')];
  for (const row of rows) {
    const fields = [row.symbol, row.sector, String(row.buyScore), row.reasonsToBuy];
    if (options.includeProvenance) fields.push(row.provenance);
    lines.push(fields.map(escapeCsvField).join(','));
  }
  return `${lines.join('\n')}\n`;
}
