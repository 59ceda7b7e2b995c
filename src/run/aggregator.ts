/**
 * Aggregator: collects published chunk results, emails the top rows and
 * clears the run's objects from storage.
 */

import { createChildLogger } from '@/utils/logger';
import type { StorageLayout } from '@/core/config';
import { ConfigurationError } from '@/core/errors';
import type { ObjectStore } from '@/storage/types';
import { runIdFromKey, runPrefix } from '@/storage/keys';
import { validateChunkResult } from '@/validation/ajv_instance';
import type { RankedRow } from '@/types/pipeline';
import type { ReportMailer } from './report';
import { fromChunkResultRow } from './publisher';

const logger = createChildLogger('aggregator');

export function aggregateSubject(count: number): string {
  return `Top 25 Stock Picks from ${count} Stocks`;
}

export interface CollectedRows {
  rows: RankedRow[];
  chunkKeys: string[];
  skippedKeys: string[];
  runIds: string[];
}

export interface AggregationResult {
  status: 'empty' | 'emailed' | 'email_failed';
  runIds: string[];
  chunksRead: number;
  chunksSkipped: number;
  totalRows: number;
  topRows: RankedRow[];
  deletedObjects: number;
  emailError: string | null;
}

export class Aggregator {
  constructor(
    private readonly store: ObjectStore,
    private readonly layout: StorageLayout,
    private readonly report: ReportMailer | null
  ) {}

  async collect(runId?: string): Promise<CollectedRows> {
    const keys = await this.store.list(runPrefix(this.layout.chunkPrefix, runId));
    const rows: RankedRow[] = [];
    const chunkKeys: string[] = [];
    const skippedKeys: string[] = [];
    const runIds = new Set<string>();

    for (const key of keys) {
      const owner = runIdFromKey(this.layout.chunkPrefix, key);
      if (owner) runIds.add(owner);

      try {
        const body = await this.store.get(key);
        if (body === null) {
          skippedKeys.push(key);
          continue;
        }
        const result = validateChunkResult(JSON.parse(body));
        if (!result.valid || !result.data) {
          logger.warn({ key, errors: result.errors }, 'Skipping malformed chunk result');
          skippedKeys.push(key);
          continue;
        }
        rows.push(...result.data.rows.map(fromChunkResultRow));
        chunkKeys.push(key);
      } catch (error) {
        logger.warn(
          { key, error: error instanceof Error ? error.message : String(error) },
          'Skipping unreadable chunk result'
        );
        skippedKeys.push(key);
      }
    }

    if (runId) runIds.add(runId);
    return { rows, chunkKeys, skippedKeys, runIds: [...runIds].sort() };
  }

  async finalize(runId?: string): Promise<AggregationResult> {
    const report = this.report;
    if (!report) {
      throw new ConfigurationError('EMAIL_RECIPIENT is required to deliver results');
    }
    const collected = await this.collect(runId);
    const base = {
      runIds: collected.runIds,
      chunksRead: collected.chunkKeys.length,
      chunksSkipped: collected.skippedKeys.length,
      totalRows: collected.rows.length,
    };

    if (collected.rows.length === 0) {
      logger.info({ runId }, 'No results found');
      return { ...base, status: 'empty', topRows: [], deletedObjects: 0, emailError: null };
    }

    let topRows = report.rank(collected.rows);
    let emailError: string | null = null;
    try {
      const delivered = await report.deliver(collected.rows, aggregateSubject(collected.rows.length));
      topRows = delivered.topRows;
    } catch (error) {
      emailError = error instanceof Error ? error.message : String(error);
      logger.error({ runId, error: emailError }, 'Failed to email results');
    }

    const deletedObjects = await this.cleanup(collected);
    logger.info(
      { runId, totalRows: collected.rows.length, topRows: topRows.length, deletedObjects },
      'Aggregation complete'
    );
    return {
      ...base,
      status: emailError ? 'email_failed' : 'emailed',
      topRows,
      deletedObjects,
      emailError,
    };
  }

  private async cleanup(collected: CollectedRows): Promise<number> {
    const keys = new Set<string>([...collected.chunkKeys, ...collected.skippedKeys]);
    for (const id of collected.runIds) {
      for (const prefix of [
        this.layout.chunkPrefix,
        this.layout.statusPrefix,
        this.layout.manifestPrefix,
      ]) {
        try {
          for (const key of await this.store.list(runPrefix(prefix, id))) {
            keys.add(key);
          }
        } catch (error) {
          logger.warn(
            { prefix, runId: id, error: error instanceof Error ? error.message : String(error) },
            'Cleanup listing failed'
          );
        }
      }
    }

    let deleted = 0;
    for (const key of keys) {
      try {
        await this.store.delete(key);
        deleted++;
      } catch (error) {
        logger.warn(
          { key, error: error instanceof Error ? error.message : String(error) },
          'Cleanup failed for object'
        );
      }
    }
    return deleted;
  }
}
