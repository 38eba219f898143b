import { Mutex, sleep } from '@core/concurrency';
import type { Clock } from './types';

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep,
};

/**
 * Enforces a minimum spacing between outbound calls.
 *
 * Callers queue on a mutex around the last-call watermark, so concurrent
 * callers never compute the same free slot. Share one instance across every
 * component that talks to the same backend.
 */
export class RateLimiter {
  readonly intervalMs: number;
  private readonly mutex = new Mutex();
  private lastCall: number | undefined;

  constructor(
    requestsPerMinute: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!(requestsPerMinute > 0)) {
      throw new RangeError(`requestsPerMinute must be positive, got ${requestsPerMinute}`);
    }
    this.intervalMs = 60_000 / requestsPerMinute;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.lastCall !== undefined) {
        const wait = this.lastCall + this.intervalMs - this.clock.now();
        if (wait > 0) await this.clock.sleep(wait, signal);
      }
      this.lastCall = this.clock.now();
    }, signal);
  }
}
