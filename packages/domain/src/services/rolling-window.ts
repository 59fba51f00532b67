/**
 * Fixed-capacity FIFO buffer. When full, each push overwrites the oldest entry.
 *
 * Mutation and `toArray()` are synchronous, so on the event loop every call
 * observes the buffer between two whole pushes, never in the middle of one.
 */
export class RollingWindow<T> {
  private readonly buffer: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new Error(`Window capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(capacity).fill(undefined);
  }

  /** Appends an entry and returns the evicted one, if any. */
  push(item: T): T | undefined {
    const evicted = this.count === this.capacity ? this.buffer[this.head] : undefined;
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    }
    return evicted;
  }

  /** Copy of the contents, oldest first. */
  toArray(): T[] {
    const start = this.count < this.capacity ? 0 : this.head;
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(start + i) % this.capacity];
      if (item !== undefined) {
        out.push(item);
      }
    }
    return out;
  }

  oldest(): T | undefined {
    if (this.count === 0) return undefined;
    const start = this.count < this.capacity ? 0 : this.head;
    return this.buffer[start];
  }

  newest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
