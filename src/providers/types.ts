/**
 * Shared types and interfaces for fundamentals sources.
 *
 * Sources implement a single lookup; the fetcher layers retries, fallback
 * and provenance on top without knowing which HTTP API sits underneath.
 */
import type { Fundamentals, MetricValues } from '@/types/pipeline';

export interface SourcePayload {
  metrics: MetricValues;
  /** Number of populated fields in the raw response, before mapping. */
  rawFieldCount: number;
}

export interface FundamentalsSource {
  readonly name: string;
  getFundamentals(symbol: string, signal?: AbortSignal): Promise<SourcePayload>;
}

/** What the chunk processor and the sequential path need from a fetcher. */
export interface FundamentalsProvider {
  fetch(symbol: string): Promise<Fundamentals | null>;
}

/**
 * rate_limited: throttled by the source, back off exponentially.
 * transient: timeout or network trouble, same policy.
 * insufficient: a payload arrived but failed validation.
 * fatal: anything else; retried without escalating the delay.
 */
export type ProviderErrorKind = 'rate_limited' | 'transient' | 'insufficient' | 'fatal';

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public kind: ProviderErrorKind = 'fatal',
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

const RATE_LIMIT_MARKERS = ['429', 'too many requests', 'rate limit'];
const TRANSIENT_MARKERS = [
  'timeout',
  'timed out',
  'connection',
  'network',
  'econnreset',
  'econnrefused',
  'enotfound',
  'eai_again',
  'socket hang up',
  'fetch failed',
];

export function classifyProviderError(error: unknown): ProviderErrorKind {
  if (error instanceof ProviderError) {
    return error.kind;
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'transient';
  }

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (RATE_LIMIT_MARKERS.some((marker) => message.includes(marker))) {
    return 'rate_limited';
  }
  if (TRANSIENT_MARKERS.some((marker) => message.includes(marker))) {
    return 'transient';
  }
  return 'fatal';
}

export function kindForHttpStatus(status: number): ProviderErrorKind {
  if (status === 429) return 'rate_limited';
  if (status >= 500 || status === 408) return 'transient';
  return 'fatal';
}

export function countValidMetrics(metrics: MetricValues): number {
  return Object.values(metrics).filter((value) => value !== null).length;
}
