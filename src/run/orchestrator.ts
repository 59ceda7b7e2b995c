/**
 * Orchestrator: runs small universes in-process and fans large ones out to
 * chunk workers.
 */

import { createChildLogger } from '@/utils/logger';
import type { PipelineConfig } from '@/core/config';
import { ConfigurationError, InputError } from '@/core/errors';
import { getRunId, secondsToWholeMinutes } from '@/core/time';
import { toWireStockRecords } from '@/core/universe';
import { isEligibleForScoring } from '@/pipeline/filters';
import type { FundamentalsFetcher } from '@/providers/fundamentals_fetcher';
import type { ScoringOracleAdapter } from '@/llm/adapter';
import type { WorkerInvoker } from '@/dispatch/process_invoker';
import { RequestThrottler } from '@/utils/throttler';
import { sleep as defaultSleep, type Sleep } from '@/utils/timing';
import { randomHex } from '@/utils/hash';
import type { FetchedStock, RankedRow, StockRecord } from '@/types/pipeline';
import type { ReportMailer } from './report';
import type { CompletionTracker } from './completion';
import { buildRankedRows } from './ranking';
import { partitionUniverse } from './partition';

const logger = createChildLogger('orchestrator');

export const SEQUENTIAL_SUBJECT = 'Top 25 Stock Buy Picks';

export interface SequentialRunResult {
  mode: 'sequential';
  runId: string;
  resultsCount: number;
  totalScored: number;
  attempted: number;
  eligible: number;
  syntheticCount: number;
}

export interface DistributedRunResult {
  mode: 'distributed';
  runId: string;
  chunksCreated: number;
  chunksLaunched: number;
  estimatedCompletionSeconds: number;
  estimatedCompletionMinutes: number;
  completionTracked: boolean;
}

export type OrchestratorResult = SequentialRunResult | DistributedRunResult;

export interface OrchestratorDeps {
  config: PipelineConfig;
  fetcher: FundamentalsFetcher;
  adapter: ScoringOracleAdapter;
  report: ReportMailer | null;
  invoker: WorkerInvoker;
  completion: CompletionTracker;
  sleep?: Sleep;
  now?: () => Date;
  makeRunId?: (now: Date) => string;
}

export class Orchestrator {
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly makeRunId: (now: Date) => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
    this.makeRunId = deps.makeRunId ?? ((now) => getRunId(now, randomHex(8)));
  }

  async run(universe: StockRecord[]): Promise<OrchestratorResult> {
    const report = this.deps.report;
    if (!report) {
      throw new ConfigurationError('EMAIL_RECIPIENT is required to deliver results');
    }
    if (universe.length === 0) {
      throw new InputError('Universe is empty');
    }

    const runId = this.makeRunId(this.now());
    const { threshold } = this.deps.config.sequential;
    logger.info({ runId, size: universe.length, threshold }, 'Starting analysis');

    if (universe.length <= threshold) {
      return this.runSequential(runId, universe, report);
    }
    return this.runDistributed(runId, universe);
  }

  private async fetchBatch(
    batch: StockRecord[],
    throttler: RequestThrottler
  ): Promise<Map<string, FetchedStock>> {
    const fetched = new Map<string, FetchedStock>();
    for (const stock of batch) {
      try {
        const fundamentals = await throttler.schedule(() => this.deps.fetcher.fetch(stock.symbol));
        if (isEligibleForScoring(fundamentals)) {
          fetched.set(stock.symbol, { sector: stock.sector, fundamentals });
        } else {
          logger.info({ symbol: stock.symbol }, 'Skipping: no fundamentals or P/E <= 0');
        }
      } catch (error) {
        logger.warn(
          { symbol: stock.symbol, error: error instanceof Error ? error.message : String(error) },
          'Fetch failed'
        );
      }
    }
    return fetched;
  }

  private async runSequential(
    runId: string,
    universe: StockRecord[],
    report: ReportMailer
  ): Promise<SequentialRunResult> {
    const { batchSize, tickerDelayMs, batchDelayMs } = this.deps.config.sequential;
    const rows: RankedRow[] = [];
    let eligible = 0;

    for (let start = 0; start < universe.length; start += batchSize) {
      const batchNumber = start / batchSize + 1;
      const batch = universe.slice(start, start + batchSize);
      const throttler = new RequestThrottler(tickerDelayMs, this.sleep);

      const fetched = await this.fetchBatch(batch, throttler);
      eligible += fetched.size;

      if (fetched.size > 0) {
        const scores = await this.deps.adapter.score(
          [...fetched.values()].map((stock) => stock.fundamentals)
        );
        const batchRows = buildRankedRows(fetched, scores);
        rows.push(...batchRows);
        logger.info({ runId, batch: batchNumber, rows: batchRows.length }, 'Batch complete');
      }

      if (start + batchSize < universe.length) {
        await this.sleep(batchDelayMs);
      }
    }

    const delivered = await report.deliver(rows, SEQUENTIAL_SUBJECT);
    const result: SequentialRunResult = {
      mode: 'sequential',
      runId,
      resultsCount: delivered.topRows.length,
      totalScored: rows.length,
      attempted: universe.length,
      eligible,
      syntheticCount: rows.filter((row) => row.provenance === 'synthetic').length,
    };
    logger.info({ ...result, sources: this.deps.fetcher.getStats() }, 'Sequential analysis complete');
    return result;
  }

  private async runDistributed(runId: string, universe: StockRecord[]): Promise<DistributedRunResult> {
    const { chunkSize, dispatchDelayMs, perChunkEstimateSeconds, maxEstimateSeconds } =
      this.deps.config.distributed;
    const jobs = partitionUniverse(universe, chunkSize, runId);

    const completionTracked = await this.deps.completion.registerRun({
      run_id: runId,
      created_at: this.now().toISOString(),
      universe_size: universe.length,
      expected_chunk_ids: jobs.map((job) => job.chunkId),
    });

    let launched = 0;
    for (const [index, job] of jobs.entries()) {
      const ok = await this.deps.invoker.invoke({
        operation: 'process_chunk',
        chunk_id: job.chunkId,
        run_id: runId,
        stocks: toWireStockRecords(job.stocks),
      });
      if (ok) {
        launched++;
      } else {
        logger.warn({ runId, chunkId: job.chunkId }, 'Chunk dispatch failed');
      }
      if (index < jobs.length - 1) {
        await this.sleep(dispatchDelayMs);
      }
    }

    const estimatedCompletionSeconds = Math.min(maxEstimateSeconds, jobs.length * perChunkEstimateSeconds);
    const result: DistributedRunResult = {
      mode: 'distributed',
      runId,
      chunksCreated: jobs.length,
      chunksLaunched: launched,
      estimatedCompletionSeconds,
      estimatedCompletionMinutes: secondsToWholeMinutes(estimatedCompletionSeconds),
      completionTracked,
    };
    logger.info(result, 'Distributed analysis dispatched');
    return result;
  }
}
