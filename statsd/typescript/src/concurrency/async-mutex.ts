/**
 * Queue-based async mutex.
 *
 * Callers always queue first; on release the lock is handed directly to the
 * next waiter, so there is no window between checking and acquiring.
 *
 * Usage:
 * ```typescript
 * const mutex = new AsyncMutex();
 *
 * await mutex.runExclusive(async () => {
 *   // Only one caller can be here at a time
 * });
 * ```
 */

/**
 * Releases a held lock. Calling it more than once has no further effect.
 */
export type ReleaseFn = () => void;

export class AsyncMutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquire the lock, waiting in FIFO order if it is held.
   *
   * IMPORTANT: You MUST call the returned release function, preferably in a finally block.
   */
  acquire(): Promise<ReleaseFn> {
    return new Promise<ReleaseFn>((resolve) => {
      const grant = (): void => resolve(this.createRelease());

      if (!this.locked && this.waitQueue.length === 0) {
        this.locked = true;
        grant();
      } else {
        this.waitQueue.push(grant);
      }
    });
  }

  /**
   * Run `fn` while holding the lock; the lock is released whether it
   * resolves or rejects.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Whether the lock is currently held
   */
  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock
   */
  getWaitingCount(): number {
    return this.waitQueue.length;
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waitQueue.shift();
      if (next) {
        // Hand off without unlocking
        next();
      } else {
        this.locked = false;
      }
    };
  }
}
