/**
 * Single-consumer async queue exposed as an async iterator.
 *
 * Items pushed before anyone reads are buffered. `end()` finishes the
 * iterator once the buffer drains; `end(error)` makes the final read throw.
 */

interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  private items: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private ended = false;
  private failure: Error | null = null;

  push(item: T): void {
    if (this.ended) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  end(error?: Error): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.failure = error ?? null;

    // Waiters only exist while the buffer is empty
    for (const waiter of this.waiters.splice(0)) {
      this.settleEnded(waiter);
    }
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }

    if (this.ended) {
      return new Promise((resolve, reject) => this.settleEnded({ resolve, reject }));
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async return(): Promise<IteratorResult<T>> {
    this.items = [];
    this.end();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get size(): number {
    return this.items.length;
  }

  private settleEnded(waiter: Waiter<T>): void {
    if (this.failure) {
      const failure = this.failure;
      // Report the failure once; later reads just see the end
      this.failure = null;
      waiter.reject(failure);
    } else {
      waiter.resolve({ value: undefined, done: true });
    }
  }
}
