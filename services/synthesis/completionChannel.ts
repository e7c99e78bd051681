/**
 * Completion Channel
 *
 * Unbounded multi-producer, single-consumer async queue. Workers `send`
 * results as they finish; the collector iterates with `for await` until the
 * channel is closed and drained.
 */

export class CompletionChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  send(value: T): void {
    if (this.closed) {
      throw new Error('Cannot send on a closed channel');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
  }

  /** Pending values are still delivered; waiting receivers end. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const next = this.buffer.shift();
    if (next) {
      return Promise.resolve({ value: next.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.receive() };
  }
}
