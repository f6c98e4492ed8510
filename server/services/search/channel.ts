/**
 * Bounded multi-producer queue consumed with `for await`. Producers wait in
 * `send` while the buffer is full. `close` lets the consumer drain what is
 * buffered and then finish; stopping iteration early discards everything.
 */
export class Channel<T> implements AsyncIterable<T>, AsyncIterator<T, void, void> {
  private static readonly DONE: IteratorReturnResult<void> = Object.freeze({
    value: undefined,
    done: true as const,
  });

  private readonly buffer: T[] = [];
  private readonly receivers: Array<(result: IteratorResult<T, void>) => void> = [];
  private readonly senders: Array<{ value: T; resolve: (accepted: boolean) => void }> = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  /**
   * Resolves `true` once the value is buffered or handed to a waiting
   * consumer, `false` when the channel closed first.
   */
  send(value: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve(true);
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      this.senders.push({ value, resolve });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, void, void> {
    return this;
  }

  async next(): Promise<IteratorResult<T, void>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve(true);
      }
      return { value, done: false };
    }
    if (this.closed) {
      return Channel.DONE;
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  async return(): Promise<IteratorResult<T, void>> {
    this.close();
    this.buffer.length = 0;
    return Channel.DONE;
  }

  /** No more values will be accepted. Waiting producers get `false`. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver(Channel.DONE);
    }
    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }
  }
}
