type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded FIFO channel between one producer side and one consumer side.
 *
 * Consumers either await items (`next`, `for await`), wait with a bound (`poll`),
 * or take whatever is buffered without waiting (`drain`). After `close()`, buffered
 * items are still delivered and then iteration ends.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
    } else {
      this.items.push(item);
    }
    return true;
  }

  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Resolves with the next item, or `undefined` once `timeoutMs` passes or the queue closes. */
  poll(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      const waiter: Waiter<T> = (result) => {
        clearTimeout(timer);
        resolve(result.done ? undefined : result.value);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(undefined);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter({ done: true, value: undefined });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
