/**
 * FIFO mutual exclusion for async critical sections.
 *
 * Waiters are served strictly in arrival order, which keeps the order of
 * state updates equal to the order of calls.
 */
export class Mutex {
  private locked = false;
  private readonly queue: (() => void)[] = [];

  async acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve();
      } else {
        this.queue.push(resolve);
      }
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Ownership passes directly to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock */
  pending(): number {
    return this.queue.length;
  }
}
