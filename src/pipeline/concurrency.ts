/**
 * Concurrency control for modpack and unit work.
 *
 * @module pipeline/concurrency
 */

/**
 * ConcurrencyLimiter controls the maximum number of concurrent operations.
 *
 * Semaphore with a FIFO queue of waiting callers. The driver uses one
 * limiter for modpacks and the translate stage one for units.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(4);
 * const result = await limiter.run(() => translateUnit(unit));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private running = 0;
  private queue: Array<() => void> = [];

  /**
   * @throws Error if limit is not a positive integer
   */
  constructor(limit = 1) {
    if (limit < 1) {
      throw new Error('Concurrency limit must be at least 1');
    }
    if (!Number.isInteger(limit)) {
      throw new Error('Concurrency limit must be an integer');
    }
    this.limit = limit;
  }

  /**
   * Acquires a slot, waiting in FIFO order when all slots are taken.
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Releases a slot and hands it to the next waiter, if any.
   *
   * @throws Error if called without a matching acquire()
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    this.running--;

    const next = this.queue.shift();
    if (next) {
      this.running++;
      next();
    }
  }

  /**
   * Executes a function with automatic acquire/release handling.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Run `fn` over every item with at most `limit` in flight.
 * Results are returned in input order, as `Promise.allSettled` would.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const limiter = new ConcurrencyLimiter(limit);
  return Promise.allSettled(items.map((item, index) => limiter.run(() => fn(item, index))));
}
