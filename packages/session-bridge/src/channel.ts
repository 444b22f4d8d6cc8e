/**
 * Single-consumer async channel.
 *
 * Producers call `push` without ever waiting. The one consumer iterates
 * with `for await`, suspending while the channel is empty. `close` lets the
 * consumer drain what is buffered and then ends the iteration.
 */

export class AsyncChannel<T> implements AsyncIterable<T> {
  private readonly items: Array<{ readonly value: T }> = [];
  private readonly capacity: number;
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  /** @param capacity - Buffered items beyond which `push` drops. */
  constructor(capacity = Number.POSITIVE_INFINITY) {
    this.capacity = capacity;
  }

  /**
   * Hand one item to the consumer.
   * @returns false when the item was dropped (closed or full)
   */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ done: false, value: item });
      return true;
    }
    if (this.items.length >= this.capacity) return false;
    this.items.push({ value: item });
    return true;
  }

  /** No further pushes; buffered items are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ done: true, value: undefined });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items buffered and not yet consumed. */
  get size(): number {
    return this.items.length;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.items.shift();
    if (entry) {
      return Promise.resolve({ done: false, value: entry.value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.waiter) {
      return Promise.reject(new Error("AsyncChannel supports a single consumer"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      // Breaking out of `for await` ends the channel.
      return: () => {
        this.close();
        return Promise.resolve({ done: true, value: undefined });
      },
    };
  }
}
