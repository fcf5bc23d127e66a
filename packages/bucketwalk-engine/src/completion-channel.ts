/**
 * Single-consumer completion channel.
 *
 * Background tasks `post()` their results; the main loop is the only reader,
 * either by awaiting `next()`/iterating, or by draining with `tryTake()`.
 * Items are delivered in the order they were posted.
 */

export class CompletionChannel<T> {
  private queue: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];
  private closed = false;

  post(item: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.queue.push(item);
    }
  }

  /**
   * Take the next item without waiting.
   */
  tryTake(): T | undefined {
    return this.queue.shift();
  }

  /**
   * Resolve with the next item, or null once the channel is closed and drained.
   */
  async next(): Promise<T | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return queued;
    if (this.closed) return null;

    return await new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    while (this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      waiter?.(null);
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const item = await this.next();
      if (item === null) return;
      yield item;
    }
  }
}
