/**
 * Concurrency primitives for the pipeline.
 *
 * - Semaphore: bounds concurrent calls to one external dependency.
 * - runPool: a fixed number of workers draining a work queue.
 * - KeyedLock: at most one holder per key, with try/queue acquisition.
 */

export type Release = () => void;

export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  async acquire(): Promise<Release> {
    if (this.active < this.limit) {
      this.active++;
      return this.releaser();
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
    return this.releaser();
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      // Hand the permit straight to the next waiter
      if (next) next();
      else this.active--;
    };
  }
}

export interface PoolOptions {
  /** Checked before each item is taken; once aborted no new items start. */
  signal?: AbortSignal;
}

/**
 * Process `items` with at most `concurrency` running at once.
 * Items start in order. If `worker` throws, no further items start, the
 * in-flight ones finish, and the first error is rethrown.
 * Returns the indices that were started.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions = {}
): Promise<Set<number>> {
  const started = new Set<number>();
  let next = 0;
  let failed = false;
  let firstError: unknown;

  const run = async (): Promise<void> => {
    while (!failed && !options.signal?.aborted && next < items.length) {
      const index = next++;
      started.add(index);
      try {
        await worker(items[index], index);
      } catch (err) {
        if (!failed) {
          failed = true;
          firstError = err;
        }
      }
    }
  };

  const workers = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workers }, () => run()));

  if (failed) throw firstError;
  return started;
}

/** Mutual exclusion per string key. */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Take the lock only if nobody holds or awaits it. */
  tryAcquire(key: string): Release | null {
    if (this.tails.has(key)) return null;
    return this.enqueue(key).release;
  }

  /** Wait for every earlier holder of `key`, then take the lock. */
  async acquire(key: string): Promise<Release> {
    const { ready, release } = this.enqueue(key);
    await ready;
    return release;
  }

  private enqueue(key: string): { ready: Promise<void>; release: Release } {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };

    return { ready: previous, release };
  }
}
