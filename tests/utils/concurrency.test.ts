import { describe, it, expect } from 'vitest';
import { KeyedLock, runPool, Semaphore } from '../../src/utils/concurrency.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('should reject a limit below 1', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('should hand out at most `limit` permits', async () => {
    const sem = new Semaphore(2);
    const a = await sem.acquire();
    await sem.acquire();

    let third = false;
    const pending = sem.acquire().then((release) => {
      third = true;
      return release;
    });
    await Promise.resolve();
    expect(third).toBe(false);

    a();
    await pending;
    expect(third).toBe(true);
  });

  it('should release the permit when the wrapped call throws', async () => {
    const sem = new Semaphore(1);

    await expect(sem.use(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(sem.use(async () => 'next')).resolves.toBe('next');
  });

  it('should ignore a second release of the same permit', async () => {
    const sem = new Semaphore(1);
    const first = await sem.acquire();
    first();
    first();

    await sem.acquire();
    let granted = false;
    void sem.acquire().then(() => {
      granted = true;
    });
    await Promise.resolve();
    expect(granted).toBe(false);

    // releasing the stale permit again must not let a waiter in
    first();
    await Promise.resolve();
    expect(granted).toBe(false);
  });
});

describe('runPool', () => {
  it('should never run more than `concurrency` workers at once', async () => {
    let running = 0;
    let peak = 0;

    await runPool([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 1));
      running--;
    });

    expect(peak).toBe(2);
  });

  it('should start items in order and report every started index', async () => {
    const order: number[] = [];

    const started = await runPool(['a', 'b', 'c'], 1, async (_, i) => {
      order.push(i);
    });

    expect(order).toEqual([0, 1, 2]);
    expect([...started]).toEqual([0, 1, 2]);
  });

  it('should stop taking items after a worker throws and rethrow the first error', async () => {
    const seen: number[] = [];

    await expect(
      runPool([0, 1, 2, 3], 1, async (item) => {
        seen.push(item);
        if (item === 1) throw new Error('item 1 failed');
      })
    ).rejects.toThrow('item 1 failed');
    expect(seen).toEqual([0, 1]);
  });

  it('should stop taking items once the signal aborts', async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    const started = await runPool(
      [0, 1, 2, 3],
      1,
      async (item) => {
        seen.push(item);
        if (item === 1) controller.abort();
      },
      { signal: controller.signal }
    );

    expect(seen).toEqual([0, 1]);
    expect(started.has(2)).toBe(false);
  });

  it('should resolve for an empty list', async () => {
    const started = await runPool([], 4, async () => {});
    expect(started.size).toBe(0);
  });
});

describe('KeyedLock', () => {
  it('should refuse tryAcquire while the key is held', () => {
    const lock = new KeyedLock();
    const release = lock.tryAcquire('asmt-1:AC-2');

    expect(release).not.toBeNull();
    expect(lock.tryAcquire('asmt-1:AC-2')).toBeNull();
    expect(lock.tryAcquire('asmt-1:AC-3')).not.toBeNull();

    release?.();
    expect(lock.tryAcquire('asmt-1:AC-2')).not.toBeNull();
  });

  it('should queue acquire behind the current holder', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.acquire('k').then(async (release) => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      release();
    });
    const second = lock.acquire('k').then((release) => {
      events.push('second:start');
      release();
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(lock.tryAcquire('k')).not.toBeNull();
  });
});
