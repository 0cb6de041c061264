/**
 * Async mutex for serializing async critical sections.
 *
 * Node runs one event loop, but a critical section that awaits (a socket write,
 * a timer) can interleave with another caller. Holding the mutex across the
 * whole section keeps reads and writes of shared state in order.
 *
 * @example
 * ```ts
 * const mutex = new AsyncMutex();
 * await mutex.runExclusive(async () => {
 *   await doSomethingExclusive();
 * });
 * ```
 */

export class AsyncMutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquire the mutex, waiting if it is held.
   *
   * @returns A release function that MUST be called when done
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      // Ownership is handed over by release(), so the lock never reads as free in between
      await new Promise<void>(resolve => {
        this.waitQueue.push(resolve);
      });
    } else {
      this.locked = true;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waitQueue.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }

  /**
   * Run an async function with exclusive access, releasing on success or error.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  get waitingCount(): number {
    return this.waitQueue.length;
  }
}
