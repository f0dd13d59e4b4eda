/**
 * Per-device session lock. Only one session may hold a device at a time;
 * later callers wait in FIFO order.
 */

import { SessionBusyError } from '../exceptions';

interface Waiter {
  resolve: () => void;
  timeoutId?: ReturnType<typeof setTimeout>;
}

export class SessionLock {
  private held = false;
  private waiters: Waiter[] = [];

  get isLocked(): boolean {
    return this.held;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Wait for the lock.
   *
   * @param timeoutMs - Give up after this long; wait indefinitely if omitted
   * @throws {SessionBusyError} If the timeout expires first
   */
  async acquire(timeoutMs?: number): Promise<void> {
    if (!this.held) {
      this.held = true;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve };
      if (timeoutMs !== undefined) {
        waiter.timeoutId = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
            reject(new SessionBusyError(`Device still busy after ${timeoutMs}ms`));
          }
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Hand the lock to the next waiter, or free it.
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timeoutId);
      next.resolve();
    } else {
      this.held = false;
    }
  }

  /**
   * Run `fn` while holding the lock. The lock is released however `fn` ends.
   */
  async runExclusive<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
