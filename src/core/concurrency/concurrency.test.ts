import { describe, it, expect } from 'vitest';
import { Semaphore } from './semaphore';
import { KeyedMutex, Mutex } from './mutex';
import { sleep } from './sleep';
import { CancelledError } from '@utils/errors';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('rejects non-positive permit counts', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore permits must be a positive integer, got 0');
  });

  it('never runs more than its permit count at once', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.use(async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(5);
          active--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(active).toBe(0);
  });

  it('hands permits to waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    const order: number[] = [];

    const waiters = [1, 2, 3].map((n) => semaphore.use(async () => void order.push(n)));
    expect(semaphore.pending).toBe(3);

    release();
    await Promise.all(waiters);
    expect(order).toEqual([1, 2, 3]);
  });

  it('releases the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.use(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(semaphore.use(async () => 'ok')).resolves.toBe('ok');
  });

  it('drops an aborted waiter from the queue', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort(new CancelledError('batch aborted'));

    await expect(waiting).rejects.toThrow('batch aborted');
    expect(semaphore.pending).toBe(0);
    release();
    await expect(semaphore.use(async () => 'free')).resolves.toBe('free');
  });

  it('ignores a second call to the same release', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    release();
    release();

    const first = await semaphore.acquire();
    let secondGranted = false;
    const second = semaphore.acquire().then((r) => {
      secondGranted = true;
      return r;
    });
    await sleep(5);
    expect(secondGranted).toBe(false);
    first();
    (await second)();
  });
});

describe('Mutex', () => {
  it('reports whether it is held', async () => {
    const mutex = new Mutex();
    const gate = deferred();
    const running = mutex.runExclusive(() => gate.promise);
    await sleep(1);
    expect(mutex.isLocked).toBe(true);
    gate.resolve();
    await running;
    expect(mutex.isLocked).toBe(false);
  });
});

describe('KeyedMutex', () => {
  it('serializes work on the same key', async () => {
    const locks = new KeyedMutex();
    const log: string[] = [];

    await Promise.all([
      locks.runExclusive('topic', async () => {
        log.push('a:start');
        await sleep(10);
        log.push('a:end');
      }),
      locks.runExclusive('topic', async () => {
        log.push('b:start');
        log.push('b:end');
      }),
    ]);

    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets different keys proceed independently', async () => {
    const locks = new KeyedMutex();
    const gate = deferred();
    const log: string[] = [];

    const blocked = locks.runExclusive('first', async () => {
      await gate.promise;
      log.push('first');
    });
    await locks.runExclusive('second', async () => {
      log.push('second');
    });
    gate.resolve();
    await blocked;

    expect(log).toEqual(['second', 'first']);
  });

  it('forgets keys once idle', async () => {
    const locks = new KeyedMutex();
    await locks.runExclusive('topic', async () => {
      expect(locks.size).toBe(1);
    });
    expect(locks.size).toBe(0);
  });
});

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new CancelledError('stop'));
    await expect(pending).rejects.toThrow('stop');
  });

  it('rejects immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(0, controller.signal)).rejects.toBeInstanceOf(Error);
  });
});
