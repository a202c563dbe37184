/**
 * Fixed-capacity FIFO buffer. Once full, every push overwrites the oldest item.
 */
export class RingBuffer<T> {
  readonly #capacity: number;
  readonly #items: (T | undefined)[];
  #start = 0;
  #size = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}.`);
    }
    this.#capacity = capacity;
    this.#items = new Array<T | undefined>(capacity);
  }

  get capacity(): number {
    return this.#capacity;
  }

  get size(): number {
    return this.#size;
  }

  /** Returns the evicted item when the buffer was already full. */
  push(item: T): T | undefined {
    if (this.#size < this.#capacity) {
      this.#items[(this.#start + this.#size) % this.#capacity] = item;
      this.#size += 1;
      return undefined;
    }

    const evicted = this.#items[this.#start];
    this.#items[this.#start] = item;
    this.#start = (this.#start + 1) % this.#capacity;
    return evicted;
  }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.#size; i += 1) {
      const item = this.#items[(this.#start + i) % this.#capacity];
      if (item !== undefined) {
        out.push(item);
      }
    }
    return out;
  }

  /** The `count` most recent items, oldest first. */
  recent(count: number): T[] {
    const all = this.toArray();
    return count <= 0 ? [] : all.slice(-count);
  }

  clear(): void {
    this.#items.fill(undefined);
    this.#start = 0;
    this.#size = 0;
  }
}
