import { PreconditionError } from "../errors.js";

/**
 * Fixed-capacity FIFO that drops the oldest entry once full.
 * Holds the visualizer's recent log lines.
 */
export class RingBuffer<T> {
  private items: T[] = [];
  private next = 0; // overwrite position once full

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new PreconditionError("RingBuffer capacity must be a positive integer");
    }
  }

  push(item: T): void {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return;
    }
    this.items[this.next] = item;
    this.next = (this.next + 1) % this.capacity;
  }

  /** Items oldest first. */
  toArray(): T[] {
    return [...this.items.slice(this.next), ...this.items.slice(0, this.next)];
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
    this.next = 0;
  }
}
