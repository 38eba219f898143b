import { describe, it, expect } from 'vitest';
import { RateLimiter } from './rate-limiter';
import { FakeClock } from '@/test/fakes';
import { CancelledError } from '@utils/errors';

describe('RateLimiter', () => {
  it('derives the interval from requests per minute', () => {
    expect(new RateLimiter(20).intervalMs).toBe(3000);
    expect(new RateLimiter(120).intervalMs).toBe(500);
  });

  it('rejects a non-positive rate', () => {
    expect(() => new RateLimiter(0)).toThrow('requestsPerMinute must be positive, got 0');
  });

  it('lets the first call through immediately', async () => {
    const clock = new FakeClock();
    await new RateLimiter(20, clock).acquire();
    expect(clock.now()).toBe(0);
  });

  it('spaces concurrent callers by the full interval', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(20, clock);
    const granted: number[] = [];

    await Promise.all(
      Array.from({ length: 4 }, async () => {
        await limiter.acquire();
        granted.push(clock.now());
      })
    );

    expect(granted).toEqual([0, 3000, 6000, 9000]);
  });

  it('only waits for the remaining part of the interval', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(20, clock);

    await limiter.acquire();
    await clock.sleep(1000);
    await limiter.acquire();

    expect(clock.now()).toBe(3000);
  });

  it('stops waiting when the signal is aborted', async () => {
    const limiter = new RateLimiter(1);
    await limiter.acquire();

    const controller = new AbortController();
    const waiting = limiter.acquire(controller.signal);
    controller.abort(new CancelledError('batch failed'));

    await expect(waiting).rejects.toThrow('batch failed');
  });
});
