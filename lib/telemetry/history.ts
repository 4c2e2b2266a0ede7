export const HISTORY_CAPACITY = 30;

/**
 * Fixed-capacity FIFO. Appending to a full buffer drops the oldest entry.
 */
export class HistoryBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number = HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get length() {
    return this.count;
  }

  push(entry: T) {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = entry;
    if (this.count === this.capacity) {
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.count += 1;
    }
  }

  last(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  clear() {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  /** Oldest first */
  toArray(): Array<T> {
    const out: Array<T> = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.slots[(this.head + i) % this.capacity];
      if (entry !== undefined) out.push(entry);
    }
    return out;
  }
}
