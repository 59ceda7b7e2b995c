/**
 * Rate limiter for outbound data-source requests.
 * Bounds concurrent work and the number of task starts per rolling minute.
 */

import { createChildLogger } from '@/utils/logger';
import { sleep, type Sleep } from '@/utils/timing';

const logger = createChildLogger('rate_limiter');

export interface RateLimiterConfig {
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(
    config: Partial<RateLimiterConfig> = {},
    private readonly wait: Sleep = sleep
  ) {
    this.config = {
      maxRequestsPerMinute: config.maxRequestsPerMinute ?? 60,
      maxConcurrent: config.maxConcurrent ?? 5,
    };
  }

  private cleanOldRequests(): void {
    const oneMinuteAgo = Date.now() - 60_000;
    this.requestTimes = this.requestTimes.filter((t) => t > oneMinuteAgo);
  }

  /** Resolves once a slot is held; a released slot passes straight to the next waiter. */
  private claimConcurrencySlot(): Promise<void> {
    if (this.activeRequests < this.config.maxConcurrent) {
      this.activeRequests++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /** Books a start time in the rolling window and returns how long to wait for it. */
  private reserveRateWindow(): number {
    this.cleanOldRequests();
    const now = Date.now();
    const { maxRequestsPerMinute } = this.config;
    let startAt = now;
    if (this.requestTimes.length >= maxRequestsPerMinute) {
      const blocking = this.requestTimes[this.requestTimes.length - maxRequestsPerMinute];
      startAt = Math.max(now, blocking + 60_000);
    }
    this.requestTimes.push(startAt);
    return startAt - now;
  }

  async acquire(): Promise<void> {
    await this.claimConcurrencySlot();
    const waitTime = this.reserveRateWindow();
    if (waitTime > 0) {
      logger.debug({ waitTime }, 'Rate limit reached, waiting');
      await this.wait(waitTime);
    }
  }

  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else {
      this.activeRequests--;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
