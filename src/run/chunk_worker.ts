/**
 * Chunk worker: fetch, score, publish and settle one chunk of a distributed run.
 */

import { createChildLogger, createRunLogger } from '@/utils/logger';
import type { ParallelChunkProcessor } from '@/pipeline/chunk_processor';
import type { FundamentalsFetcher } from '@/providers/fundamentals_fetcher';
import type { ScoringOracleAdapter } from '@/llm/adapter';
import type { ChunkJob, ScoreResult } from '@/types/pipeline';
import type { ChunkSettlement } from '@/types/contracts';
import type { ChunkResultPublisher } from './publisher';
import type { CompletionTracker } from './completion';
import { buildRankedRows } from './ranking';

const logger = createChildLogger('chunk_worker');

export interface ChunkWorkerDeps {
  processor: ParallelChunkProcessor;
  fetcher: FundamentalsFetcher;
  adapter: ScoringOracleAdapter;
  publisher: ChunkResultPublisher;
  completion: CompletionTracker;
}

export interface ChunkWorkerResult {
  chunkId: string;
  runId: string;
  resultsCount: number;
  storageKey: string | null;
  status: ChunkSettlement;
  finalizeDispatched: boolean;
}

export class ChunkWorker {
  constructor(private readonly deps: ChunkWorkerDeps) {}

  async process(job: ChunkJob): Promise<ChunkWorkerResult> {
    const { processor, adapter, publisher, completion } = this.deps;
    const log = createRunLogger(logger, job.runId, job.chunkId);
    log.info({ stocks: job.stocks.length }, 'Processing chunk');

    const { stocks: fetched } = await processor.process(job.stocks);

    let scores = new Map<string, ScoreResult>();
    if (fetched.size > 0) {
      scores = await adapter.score([...fetched.values()].map((stock) => stock.fundamentals));
    }

    const rows = buildRankedRows(fetched, scores);
    let storageKey: string | null = null;
    let status: ChunkSettlement = 'empty';
    if (rows.length > 0) {
      storageKey = await publisher.publish(rows, job.chunkId, job.runId);
      status = storageKey ? 'published' : 'failed';
    }

    await publisher.recordStatus(job.runId, job.chunkId, status, rows.length);
    const finalizeDispatched = await completion.signalIfComplete(job.runId);

    log.info(
      {
        fetched: fetched.size,
        scored: scores.size,
        rows: rows.length,
        status,
        sources: this.deps.fetcher.getStats(),
      },
      'Chunk settled'
    );
    return {
      chunkId: job.chunkId,
      runId: job.runId,
      resultsCount: rows.length,
      storageKey,
      status,
      finalizeDispatched,
    };
  }
}
