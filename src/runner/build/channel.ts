/* src/runner/build/channel.ts
 * Single-consumer event channel from a worker to its owner. The worker pushes
 * without waiting; the owner drains in order with `for await`.
 */

export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: { value: T }[] = [];
  private waiter: ((r: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    const w = this.waiter;
    if (w) {
      this.waiter = null;
      w({ value, done: false });
      return;
    }
    this.buffer.push({ value });
  }

  /** No further values; buffered values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const w = this.waiter;
    this.waiter = null;
    w?.({ value: undefined, done: true });
  }

  isClosed(): boolean {
    return this.closed;
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item) return Promise.resolve({ value: item.value, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
