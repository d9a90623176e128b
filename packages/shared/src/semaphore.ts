/**
 * Counting semaphore used as the driver's bounded worker pool.
 */
export class Semaphore {
  private permits: number;
  private waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore must have at least 1 permit, got ${permits}`);
    }
    this.permits = permits;
  }

  /** Resolve once a permit is held. */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Hand the permit to the oldest waiter, or return it to the pool. */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get availablePermits(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.waiters.length;
  }
}

/**
 * Map `fn` over `items` with at most `min(items.length, maxConcurrency)` calls
 * in flight. Results keep the input order. A single item runs inline without a
 * pool. The first rejection rejects the whole map once every started call has
 * settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (items.length === 0) return [];
  if (items.length === 1) return [await fn(items[0], 0)];

  const pool = new Semaphore(Math.min(items.length, maxConcurrency));
  const settled = await Promise.allSettled(
    items.map((item, index) => pool.execute(() => fn(item, index))),
  );

  const results: R[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') throw outcome.reason;
    results.push(outcome.value);
  }
  return results;
}
