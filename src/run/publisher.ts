/**
 * Chunk result publisher. Writes a chunk's ranked rows, and its settlement
 * marker, to the shared object store. Never throws.
 */

import { createChildLogger } from '@/utils/logger';
import type { StorageLayout } from '@/core/config';
import type { ObjectStore } from '@/storage/types';
import { chunkResultKey, chunkStatusKey } from '@/storage/keys';
import type { RankedRow } from '@/types/pipeline';
import type { ChunkResultRowV1, ChunkResultV1, ChunkSettlement, ChunkStatusV1 } from '@/types/contracts';

const logger = createChildLogger('publisher');

export function toChunkResultRow(row: RankedRow): ChunkResultRowV1 {
  return {
    Symbol: row.symbol,
    Sector: row.sector,
    BuyScore: row.buyScore,
    ReasonsToBuy: row.reasonsToBuy,
    Provenance: row.provenance,
  };
}

export function fromChunkResultRow(row: ChunkResultRowV1): RankedRow {
  return {
    symbol: row.Symbol,
    sector: row.Sector,
    buyScore: row.BuyScore,
    reasonsToBuy: row.ReasonsToBuy,
    provenance: row.Provenance,
  };
}

export class ChunkResultPublisher {
  constructor(
    private readonly store: ObjectStore,
    private readonly layout: StorageLayout,
    private readonly now: () => Date = () => new Date()
  ) {}

  async publish(rows: RankedRow[], chunkId: string, runId: string): Promise<string | null> {
    const key = chunkResultKey(this.layout, runId, chunkId);
    const document: ChunkResultV1 = {
      chunk_id: chunkId,
      run_id: runId,
      created_at: this.now().toISOString(),
      rows: rows.map(toChunkResultRow),
    };

    try {
      await this.store.put(key, JSON.stringify(document));
      logger.info({ key, rows: rows.length }, 'Chunk result published');
      return key;
    } catch (error) {
      logger.error(
        { key, error: error instanceof Error ? error.message : String(error) },
        'Failed to publish chunk result'
      );
      return null;
    }
  }

  async recordStatus(
    runId: string,
    chunkId: string,
    status: ChunkSettlement,
    resultCount: number
  ): Promise<boolean> {
    const key = chunkStatusKey(this.layout, runId, chunkId);
    const marker: ChunkStatusV1 = {
      run_id: runId,
      chunk_id: chunkId,
      status,
      result_count: resultCount,
      finished_at: this.now().toISOString(),
    };

    try {
      await this.store.put(key, JSON.stringify(marker));
      return true;
    } catch (error) {
      logger.warn(
        { key, error: error instanceof Error ? error.message : String(error) },
        'Failed to record chunk status'
      );
      return false;
    }
  }
}
