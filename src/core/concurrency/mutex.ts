import { Semaphore } from './semaphore';

export class Mutex {
  private readonly semaphore = new Semaphore(1);
  private holders = 0;

  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.semaphore.use(async () => {
      this.holders++;
      try {
        return await fn();
      } finally {
        this.holders--;
      }
    }, signal);
  }
}

/**
 * One mutex per key. Entries are dropped once nobody holds or waits on them.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; refs: number }>();

  get size(): number {
    return this.locks.size;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), refs: 0 };
      this.locks.set(key, entry);
    }
    entry.refs++;

    try {
      return await entry.mutex.runExclusive(fn, signal);
    } finally {
      entry.refs--;
      if (entry.refs === 0) this.locks.delete(key);
    }
  }
}
