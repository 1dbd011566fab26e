/**
 * A counting semaphore handing permits to waiters in FIFO order.
 *
 * With `maxConcurrent: 1` it serializes tasks onto one logical queue:
 *
 * @example
 * ```typescript
 * import { Semaphore } from "@cellchain/utils/semaphore";
 *
 * const queue = new Semaphore({ maxConcurrent: 1 });
 * const result = await queue.withPermit(() => compile(unit));
 * ```
 */

export interface SemaphoreOptions {
  maxConcurrent: number;
}

export class Semaphore {
  private available: number;
  private waitQueue: Array<() => void> = [];

  constructor(options: SemaphoreOptions) {
    this.available = options.maxConcurrent;
  }

  private acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  private release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      // The permit passes straight to the next waiter.
      next();
    } else {
      this.available++;
    }
  }

  /**
   * Runs `task` while holding a permit, releasing it however the task ends.
   */
  async withPermit<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
