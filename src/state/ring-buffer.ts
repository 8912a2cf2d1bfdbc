/**
 * Fixed-capacity FIFO buffer. Pushing past capacity evicts the oldest item.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest item
  private _size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number { return this._size; }

  /** Append an item. Returns the evicted item when the buffer was full. */
  push(item: T): T | undefined {
    if (this._size < this.capacity) {
      this.slots[(this.head + this._size) % this.capacity] = item;
      this._size++;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Items oldest-first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this._size; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  /** Up to `limit` most recent items, oldest-first. */
  latest(limit: number): T[] {
    if (limit <= 0) return [];
    return this.toArray().slice(-limit);
  }

  newest(): T | null {
    if (this._size === 0) return null;
    return this.slots[(this.head + this._size - 1) % this.capacity] ?? null;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this._size = 0;
  }
}
