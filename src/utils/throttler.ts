/**
 * Simple FIFO throttler to space out provider calls.
 * Ensures deterministic ordering and a minimum interval between task starts.
 */
import { sleep } from './timing';

export class RequestThrottler {
  private lastStart = 0;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number = 0,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.chain.then(async () => {
      if (this.lastStart > 0) {
        const waitMs = Math.max(0, this.minIntervalMs - (Date.now() - this.lastStart));
        if (waitMs > 0) {
          await this.wait(waitMs);
        }
      }
      this.lastStart = Date.now();
      return fn();
    });
    // Keep chain alive but swallow errors so subsequent tasks still run
    this.chain = run.catch(() => undefined);
    return run;
  }
}
