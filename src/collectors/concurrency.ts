/**
 * Bounded Parallelism for Collectors
 *
 * At most `limit` tasks run at once. Others wait in arrival order, and a
 * finishing task hands its slot straight to the oldest waiter.
 *
 * @module collectors/concurrency
 */

/**
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(4);
 * const records = await limiter.run(() => collector.collect({ limit: 50 }));
 * ```
 */
export class ConcurrencyLimiter {
  readonly limit: number;

  private active = 0;
  private readonly waiting: Array<() => void> = [];

  /**
   * @throws Error if limit is not a positive integer
   */
  constructor(limit: number = 4) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  /** Tasks holding a slot */
  get running(): number {
    return this.active;
  }

  /** Tasks waiting for a slot */
  get queued(): number {
    return this.waiting.length;
  }

  /**
   * Run `task` once a slot is free. The slot is given back whether the task
   * resolves or rejects.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.claimSlot();
    try {
      return await task();
    } finally {
      this.freeSlot();
    }
  }

  private claimSlot(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private freeSlot(): void {
    const next = this.waiting.shift();
    if (next) {
      // the slot moves to the waiter, so the active count stays the same
      next();
    } else {
      this.active--;
    }
  }
}
