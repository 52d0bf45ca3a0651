export type OfferResult = "ok" | "full" | "closed";

type Waiter<T> = {
  resolve: (value: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

/**
 * Async queue with an optional capacity. Producers never block: `offer` reports
 * "full" or "closed" instead. Any number of producers; consumers pull with
 * `next()` or `for await`, each value going to exactly one consumer.
 */
export class EventQueue<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: Error | null = null;

  constructor(readonly capacity = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed || this.failure !== null;
  }

  offer(value: T): OfferResult {
    if (this.isClosed) return "closed";
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
      return "ok";
    }
    if (this.buffer.length >= this.capacity) return "full";
    this.buffer.push(value);
    return "ok";
  }

  /** Stops accepting values. Buffered values are still delivered before `done`. */
  close(): void {
    if (this.isClosed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(error: Error): void {
    if (this.isClosed) return;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  return(): Promise<IteratorResult<T>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
