/**
 * Async Queue
 * Bridges push-style event sources (socket listeners) into an AsyncIterable.
 * Items are delivered in push order; a failure is delivered after the items
 * pushed before it.
 */

interface PendingRead<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
}

export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private readers: PendingRead<T>[] = [];
  private ended = false;
  private failure: { error: unknown } | null = null;

  push(item: T): void {
    if (this.ended || this.failure) {
      return;
    }

    const reader = this.readers.shift();
    if (reader) {
      reader.resolve({ value: item, done: false });
      return;
    }
    this.items.push(item);
  }

  /**
   * Mark the queue as complete; pending readers receive `done`
   */
  end(): void {
    if (this.ended || this.failure) {
      return;
    }
    this.ended = true;
    for (const reader of this.readers.splice(0)) {
      reader.resolve({ value: undefined, done: true });
    }
  }

  /**
   * Fail the queue; readers receive the error once buffered items are consumed
   */
  fail(error: unknown): void {
    if (this.ended || this.failure) {
      return;
    }
    this.failure = { error };
    for (const reader of this.readers.splice(0)) {
      reader.reject(error);
    }
  }

  get isSettled(): boolean {
    return this.ended || this.failure !== null;
  }

  get size(): number {
    return this.items.length;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.readers.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.end();
        this.items = [];
        return { value: undefined, done: true };
      },
    };
  }
}
