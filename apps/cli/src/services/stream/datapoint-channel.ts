interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (err: unknown) => void;
}

/**
 * Unbounded single-producer/single-consumer queue exposed as an async iterable.
 *
 * The producer calls `push()` and `close()`/`fail()`. The consumer iterates;
 * leaving the loop disconnects it, after which `push()` returns `false`.
 * Only one iterator may be taken.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: Waiter<T> | null = null;
  private producerDone = false;
  private failure: { error: unknown } | null = null;
  private consumerGone = false;
  private iterated = false;

  /** `onDisconnect` runs once, when the consumer leaves. */
  constructor(private readonly onDisconnect?: () => void) {}

  /** `false` once the consumer has disconnected; the value is dropped then. */
  push(value: T): boolean {
    if (this.consumerGone) return false;
    if (this.producerDone) {
      throw new Error('push after close');
    }
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ done: false, value });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /** End of data. Buffered values are still delivered. */
  close(): void {
    if (this.producerDone) return;
    this.producerDone = true;
    this.settleWaiter();
  }

  /** Deliver buffered values, then reject the consumer's next read with `error`. */
  fail(error: unknown): void {
    if (this.producerDone) return;
    this.failure = { error };
    this.producerDone = true;
    this.settleWaiter();
  }

  get disconnected(): boolean {
    return this.consumerGone;
  }

  get size(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.iterated) {
      throw new Error('channel already has a consumer');
    }
    this.iterated = true;

    return {
      next: () => this.next(),
      return: async () => {
        this.disconnect();
        return { done: true, value: undefined };
      },
    };
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.consumerGone) {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      this.consumerGone = true;
      return Promise.reject(error);
    }
    if (this.producerDone) {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.waiter) {
      return Promise.reject(new Error('concurrent read on channel'));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  private disconnect(): void {
    if (this.consumerGone) return;
    this.consumerGone = true;
    this.buffer.length = 0;
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ done: true, value: undefined });
    }
    this.onDisconnect?.();
  }

  private settleWaiter(): void {
    if (!this.waiter) return;
    const { resolve, reject } = this.waiter;
    this.waiter = null;
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      this.consumerGone = true;
      reject(error);
    } else {
      resolve({ done: true, value: undefined });
    }
  }
}
