/**
 * Fundamentals fetcher: primary source with retries, then the secondary
 * source, then deterministic synthetic data.
 */

import { createChildLogger } from '@/utils/logger';
import type { FetchConfig } from '@/core/config';
import type { Fundamentals, Provenance } from '@/types/pipeline';
import { sleep as defaultSleep, type RandomSource, type Sleep } from '@/utils/timing';
import {
  ProviderError,
  classifyProviderError,
  countValidMetrics,
  type FundamentalsProvider,
  type FundamentalsSource,
  type ProviderErrorKind,
  type SourcePayload,
} from './types';
import { syntheticFundamentals } from './synthetic';

const logger = createChildLogger('fundamentals_fetcher');

export type FetcherOptions = Pick<
  FetchConfig,
  | 'maxAttempts'
  | 'baseDelayMs'
  | 'jitterMs'
  | 'primaryTimeoutMs'
  | 'secondaryTimeoutMs'
  | 'minPrimaryFields'
  | 'minSecondaryMetrics'
  | 'allowSynthetic'
>;

export interface FundamentalsFetcherDeps {
  primary: FundamentalsSource;
  secondary?: FundamentalsSource | null;
  options: FetcherOptions;
  sleep?: Sleep;
  random?: RandomSource;
}

export interface FetcherStats {
  requested: number;
  primary: number;
  secondary: number;
  synthetic: number;
  failed: number;
  retries: number;
}

export class FundamentalsFetcher implements FundamentalsProvider {
  private readonly primary: FundamentalsSource;
  private readonly secondary: FundamentalsSource | null;
  private readonly options: FetcherOptions;
  private readonly sleep: Sleep;
  private readonly random: RandomSource;
  private readonly stats: FetcherStats = {
    requested: 0,
    primary: 0,
    secondary: 0,
    synthetic: 0,
    failed: 0,
    retries: 0,
  };

  constructor(deps: FundamentalsFetcherDeps) {
    this.primary = deps.primary;
    this.secondary = deps.secondary ?? null;
    this.options = deps.options;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  getStats(): FetcherStats {
    return { ...this.stats };
  }

  /** Delay before the retry that follows failed attempt `attempt` (0-based). */
  retryDelayMs(kind: ProviderErrorKind, attempt: number): number {
    const { baseDelayMs, jitterMs } = this.options;
    if (kind === 'fatal') return baseDelayMs;
    return baseDelayMs * 2 ** attempt + this.random() * jitterMs;
  }

  async fetch(symbol: string): Promise<Fundamentals | null> {
    this.stats.requested++;

    const primary = await this.fetchPrimary(symbol);
    if (primary) return this.record(symbol, 'primary', primary);

    if (this.secondary) {
      const secondary = await this.fetchSecondary(this.secondary, symbol);
      if (secondary) return this.record(symbol, 'secondary', secondary);
    } else {
      logger.debug({ symbol }, 'No secondary source configured');
    }

    if (!this.options.allowSynthetic) {
      this.stats.failed++;
      logger.warn({ symbol }, 'All sources failed, no fundamentals');
      return null;
    }

    this.stats.synthetic++;
    logger.warn({ symbol }, 'All sources failed, using synthetic fundamentals');
    return syntheticFundamentals(symbol);
  }

  private record(symbol: string, provenance: Provenance, payload: SourcePayload): Fundamentals {
    if (provenance === 'primary') this.stats.primary++;
    if (provenance === 'secondary') this.stats.secondary++;
    return { symbol, provenance, metrics: payload.metrics };
  }

  private async fetchPrimary(symbol: string): Promise<SourcePayload | null> {
    const { maxAttempts, primaryTimeoutMs, minPrimaryFields } = this.options;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      let kind: ProviderErrorKind;
      try {
        const payload = await this.primary.getFundamentals(
          symbol,
          AbortSignal.timeout(primaryTimeoutMs)
        );
        const pe = payload.metrics['P/E Ratio'];
        if (payload.rawFieldCount >= minPrimaryFields && pe !== null && pe > 0) {
          return payload;
        }
        kind = 'insufficient';
        logger.debug(
          { symbol, attempt, rawFieldCount: payload.rawFieldCount, pe },
          'Primary payload insufficient'
        );
      } catch (error) {
        kind = classifyProviderError(error);
        logger.debug(
          { symbol, attempt, kind, error: error instanceof Error ? error.message : String(error) },
          'Primary fetch failed'
        );
      }

      if (attempt < maxAttempts - 1) {
        this.stats.retries++;
        await this.sleep(this.retryDelayMs(kind, attempt));
      }
    }

    logger.info({ symbol, attempts: maxAttempts }, 'Primary source exhausted');
    return null;
  }

  private async fetchSecondary(
    source: FundamentalsSource,
    symbol: string
  ): Promise<SourcePayload | null> {
    try {
      const payload = await source.getFundamentals(
        symbol,
        AbortSignal.timeout(this.options.secondaryTimeoutMs)
      );
      const valid = countValidMetrics(payload.metrics);
      if (valid >= this.options.minSecondaryMetrics) {
        return payload;
      }
      logger.info({ symbol, valid }, 'Secondary payload has too few metrics');
      return null;
    } catch (error) {
      const detail =
        error instanceof ProviderError
          ? { kind: error.kind, error: error.message }
          : { error: error instanceof Error ? error.message : String(error) };
      logger.info({ symbol, ...detail }, 'Secondary fetch failed');
      return null;
    }
  }
}
