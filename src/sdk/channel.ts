/**
 * Multi-producer, single-consumer async queue. Producers `send`; the
 * consumer iterates with `for await` until the channel is closed and drained.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private pending?: (result: IteratorResult<T>) => void;
  private closed = false;
  private iterating = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Values sent but not yet consumed */
  get size(): number {
    return this.buffer.length;
  }

  send(value: T): void {
    if (this.closed) {
      throw new Error("Cannot send on a closed channel.");
    }

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      pending({ value, done: false });
      return;
    }
    this.buffer.push(value);
  }

  /**
   * No further values will be sent. Buffered values are still delivered.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      pending({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) {
      throw new Error("ResultChannel supports a single consumer.");
    }
    this.iterating = true;

    return {
      next: () => this.next(),
    };
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }
}
