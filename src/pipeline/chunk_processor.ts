/**
 * Parallel chunk processor: fetches fundamentals for a set of stocks with a
 * bounded number of concurrent fetches and waits for every one to settle.
 */

import { createChildLogger } from '@/utils/logger';
import { RateLimiter } from '@/providers/rate_limiter';
import type { FundamentalsProvider } from '@/providers/types';
import type { DelayRange } from '@/core/config';
import type { FetchedStock, Fundamentals, Provenance, StockRecord } from '@/types/pipeline';
import { randomBetween, sleep as defaultSleep, type RandomSource, type Sleep } from '@/utils/timing';
import { eligibilityFailure, type DropReason } from './filters';

const logger = createChildLogger('chunk_processor');

export interface ChunkProcessorOptions {
  maxWorkers: number;
  maxRequestsPerMinute: number;
  preFetchDelayMs: DelayRange;
}

export interface ProcessingStats {
  attempted: number;
  eligible: number;
  dropped: Record<DropReason, number>;
  provenance: Record<Provenance, number>;
}

export interface ChunkProcessingResult {
  stocks: Map<string, FetchedStock>;
  stats: ProcessingStats;
}

export class ParallelChunkProcessor {
  private readonly sleep: Sleep;
  private readonly random: RandomSource;

  constructor(
    private readonly fetcher: FundamentalsProvider,
    private readonly options: ChunkProcessorOptions,
    deps: { sleep?: Sleep; random?: RandomSource } = {}
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  async process(stocks: StockRecord[]): Promise<ChunkProcessingResult> {
    const limiter = new RateLimiter(
      {
        maxConcurrent: this.options.maxWorkers,
        maxRequestsPerMinute: this.options.maxRequestsPerMinute,
      },
      this.sleep
    );
    const { min, max } = this.options.preFetchDelayMs;

    const settled = await Promise.allSettled(
      stocks.map((stock) =>
        limiter.run(async () => {
          await this.sleep(randomBetween(min, max, this.random));
          return this.fetcher.fetch(stock.symbol);
        })
      )
    );

    const result = new Map<string, FetchedStock>();
    const stats: ProcessingStats = {
      attempted: stocks.length,
      eligible: 0,
      dropped: { fetch_failed: 0, missing_pe: 0, non_positive_pe: 0 },
      provenance: { primary: 0, secondary: 0, synthetic: 0 },
    };

    settled.forEach((outcome, index) => {
      const stock = stocks[index];
      let fundamentals: Fundamentals | null = null;
      if (outcome.status === 'fulfilled') {
        fundamentals = outcome.value;
      } else {
        logger.warn(
          { symbol: stock.symbol, error: String(outcome.reason) },
          'Fetch rejected'
        );
      }

      const reason = eligibilityFailure(fundamentals);
      if (reason !== null || !fundamentals) {
        stats.dropped[reason ?? 'fetch_failed']++;
        return;
      }

      stats.eligible++;
      stats.provenance[fundamentals.provenance]++;
      result.set(stock.symbol, { sector: stock.sector, fundamentals });
    });

    logger.info(stats, 'Chunk fetch complete');
    return { stocks: result, stats };
  }
}
