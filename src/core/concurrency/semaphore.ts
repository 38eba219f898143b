import { abortReason, throwIfAborted } from './sleep';

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
}

/**
 * Counting semaphore with FIFO hand-off.
 *
 * A released permit goes straight to the oldest waiter, so a burst of
 * acquirers cannot starve the queue.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<Release> {
    throwIfAborted(signal);

    if (this.available > 0) {
      this.available--;
      return this.createRelease();
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };

      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        if (signal) reject(abortReason(signal));
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next.grant(this.createRelease());
      } else {
        this.available++;
      }
    };
  }
}
