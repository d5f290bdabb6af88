/**
 * Ring-buffer FIFO used by the tasks pool. Capacity grows in powers of two.
 */
export class FifoTaskQueue<T> {
  private buffer: Array<T | undefined>;
  private mask: number;
  private head: number;
  private tail: number;

  constructor(capacity: number = 32) {
    const size = this._normalizeCapacity(capacity);
    this.buffer = new Array<T | undefined>(size);
    this.mask = size - 1;
    this.head = 0;
    this.tail = 0;
  }

  get length(): number {
    return this.tail - this.head;
  }

  enqueue(value: T): void {
    if (this.length >= this.buffer.length) {
      this._grow();
    }
    this.buffer[this.tail & this.mask] = value;
    this.tail++;
  }

  dequeue(): T | undefined {
    if (this.head === this.tail) {
      return undefined;
    }
    const index = this.head & this.mask;
    const value = this.buffer[index];
    this.buffer[index] = undefined;
    this.head++;
    if (this.head === this.tail) {
      this.head = 0;
      this.tail = 0;
    }
    return value;
  }

  /** Empties the queue, handing each removed item to `callback` in order. */
  flush(callback?: (item: T) => void): void {
    for (let item = this.dequeue(); item !== undefined; item = this.dequeue()) {
      callback?.(item);
    }
  }

  private _grow(): void {
    const newSize = this.buffer.length * 2;
    const next = new Array<T | undefined>(newSize);
    const len = this.length;
    for (let i = 0; i < len; i++) {
      next[i] = this.buffer[(this.head + i) & this.mask];
    }
    this.buffer = next;
    this.mask = newSize - 1;
    this.head = 0;
    this.tail = len;
  }

  private _normalizeCapacity(value: number): number {
    let size = 8;
    const normalized = Number.isFinite(value) && value > 0 ? Math.ceil(value) : size;
    const target = Math.max(size, normalized);
    while (size < target) {
      size <<= 1;
    }
    return size;
  }
}
