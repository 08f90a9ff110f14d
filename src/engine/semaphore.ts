/**
 * Counting semaphore bounding how many steps are in flight at once.
 * Waiters are served in FIFO order.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error("Semaphore permits must be an integer >= 1");
    }
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  /** Hands the permit straight to the oldest waiter, if any. */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  /**
   * Run `fn` while holding a permit. The permit is released whether `fn`
   * resolves or rejects.
   */
  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get pending(): number {
    return this.waiting.length;
  }
}
