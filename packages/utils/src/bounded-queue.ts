/**
 * Bounded FIFO queue that drops the oldest item on overflow
 *
 * push never blocks and never fails; consumers drain at their own pace.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private dropped = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedQueue capacity must be a positive integer, got ${String(capacity)}`);
    }
  }

  /**
   * Enqueue an item
   *
   * @returns the item evicted to make room, if any
   */
  push(item: T): T | undefined {
    this.items.push(item);
    if (this.items.length <= this.capacity) return undefined;

    this.dropped++;
    return this.items.shift();
  }

  /**
   * Remove and return up to max items, oldest first
   */
  drain(max: number = this.items.length): T[] {
    return this.items.splice(0, Math.max(0, max));
  }

  /**
   * Put items back at the head, keeping capacity (newest win)
   */
  requeue(items: T[]): void {
    const merged = [...items, ...this.items];
    const overflow = Math.max(0, merged.length - this.capacity);
    this.dropped += overflow;
    this.items = merged.slice(overflow);
  }

  get size(): number {
    return this.items.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }
}
