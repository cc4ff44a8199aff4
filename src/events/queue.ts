// ---------------------------------------------------------------------------
// BoundedQueue – non-blocking producer, awaiting consumer
// ---------------------------------------------------------------------------
// `offer` never waits: it returns false when the queue is full or closed.
// `take` waits for the next item and yields `undefined` once the queue is
// closed and drained.
// ---------------------------------------------------------------------------

type Waiter<T> = (item: T | undefined) => void;

export class BoundedQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get full(): boolean {
    return this.items.length >= this.capacity;
  }

  offer(item: T): boolean {
    if (this.isClosed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    if (this.full) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Items already queued stay available to `take`; waiting takers get `undefined`. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.take();
      if (item === undefined) return;
      yield item;
    }
  }
}
