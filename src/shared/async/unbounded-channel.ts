/**
 * Single-consumer FIFO channel. `send` never waits, so a producer reading a
 * socket is never held back by a slow consumer. Closing the channel lets the
 * consumer drain what is queued and then ends its iteration.
 */
export class UnboundedChannel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private iterating = false;

  send(item: T): boolean {
    if (this.closed) {
      return false;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return true;
    }

    this.queue.push(item);
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.queue.length > 0) {
      const item = this.queue[0];
      this.queue.shift();
      return Promise.resolve({ value: item, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    if (this.waiter) {
      return Promise.reject(
        new Error("UnboundedChannel supports a single pending receiver."),
      );
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) {
      throw new Error("UnboundedChannel supports a single consumer.");
    }
    this.iterating = true;

    return {
      next: () => this.next(),
    };
  }
}
