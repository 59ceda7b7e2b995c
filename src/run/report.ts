/**
 * Ranks collected rows, renders the CSV and emails it.
 */

import { createChildLogger } from '@/utils/logger';
import type { OutputConfig } from '@/core/config';
import type { EmailSender } from '@/notify/email';
import type { RankedRow } from '@/types/pipeline';
import { rankRows } from './ranking';
import { renderCsv } from './csv';

const logger = createChildLogger('report');

export interface ReportAddresses {
  recipient: string;
  sender: string;
}

export interface DeliveredReport {
  topRows: RankedRow[];
  csv: string;
  messageId: string | null;
}

export function buildEmailBody(topRows: RankedRow[], totalRows: number): string {
  const synthetic = topRows.filter((row) => row.provenance === 'synthetic').length;
  const lines = [
    `Attached are the top ${topRows.length} of ${totalRows} scored stocks, ranked by Buy Score from fundamental data.`,
  ];
  if (synthetic > 0) {
    lines.push(
      '',
      `Note: ${synthetic} of the listed stocks were scored on synthetic placeholder data because no market data source answered.`
    );
  }
  return `${lines.join('\n')}\n`;
}

export class ReportMailer {
  constructor(
    private readonly sender: EmailSender,
    private readonly addresses: ReportAddresses,
    private readonly output: OutputConfig
  ) {}

  rank(rows: RankedRow[]): RankedRow[] {
    return rankRows(rows, this.output.topN);
  }

  /** Rejects when the email could not be sent. */
  async deliver(rows: RankedRow[], subject: string): Promise<DeliveredReport> {
    const topRows = this.rank(rows);
    const csv = renderCsv(topRows, { includeProvenance: this.output.includeProvenance });

    const messageId = await this.sender.send({
      from: this.addresses.sender,
      to: this.addresses.recipient,
      subject,
      text: buildEmailBody(topRows, rows.length),
      attachments: [{ filename: this.output.csvFilename, content: csv, contentType: 'text/csv' }],
    });

    logger.info({ subject, topRows: topRows.length, totalRows: rows.length }, 'Report delivered');
    return { topRows, csv, messageId };
  }
}
