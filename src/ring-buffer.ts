/**
 * Fixed-capacity ring buffer.
 *
 * Used for every "most recent N" list the controller keeps (exit signals,
 * circuit breaker outcomes). Pushing past capacity overwrites the oldest entry.
 */

export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number, initial: readonly T[] = []) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
    for (const item of initial) {
      this.push(item);
    }
  }

  push(item: T): void {
    const index = (this.start + this.count) % this.capacity;
    this.slots[index] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /** Oldest first */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) {
        items.push(item);
      }
    }
    return items;
  }
}
