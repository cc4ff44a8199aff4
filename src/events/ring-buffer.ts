/**
 * Fixed-capacity ring buffer. Pushing into a full buffer overwrites the
 * oldest entry; nothing is ever shifted.
 */
export class RingBuffer<T> {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private tail = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  push(value: T): void {
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.tail = (this.tail + 1) % this.capacity;
    }
  }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const value = this.slots[(this.tail + i) % this.capacity];
      if (value !== undefined) {
        out.push(value);
      }
    }
    return out;
  }

  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head - 1 + this.capacity) % this.capacity];
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
