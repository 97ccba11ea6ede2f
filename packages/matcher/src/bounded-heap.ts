/**
 * Fixed-capacity binary min-heap.
 *
 * Keeps the `capacity` best items offered so far. The root is always the worst
 * retained item, so deciding whether a newcomer displaces something is O(1)
 * and the swap is O(log capacity).
 *
 * @module matcher/bounded-heap
 */

/** Negative when `a` ranks below `b`, positive when above, 0 when equal. */
export type RankComparator<T> = (a: T, b: T) => number;

export class BoundedMinHeap<T> {
  private readonly items: T[] = [];

  /**
   * @param capacity - Maximum retained items (must be a positive integer)
   * @param compare - Ranking; the lowest-ranked item is evicted first
   */
  constructor(
    readonly capacity: number,
    private readonly compare: RankComparator<T>,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`heap capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** The lowest-ranked retained item. */
  peek(): T | undefined {
    return this.items[0];
  }

  /**
   * Offer an item. Accepted unconditionally while below capacity; afterwards only
   * when it outranks the current minimum, which is then evicted.
   *
   * @returns `true` if the item was retained
   */
  offer(item: T): boolean {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.siftUp(this.items.length - 1);
      return true;
    }
    const min = this.items[0];
    if (this.compare(item, min) <= 0) return false;
    this.items[0] = item;
    this.siftDown(0);
    return true;
  }

  /** Remove and return every item, lowest rank first. */
  drain(): T[] {
    const drained: T[] = [];
    while (this.items.length > 0) {
      const min = this.items[0];
      const last = this.items.pop();
      if (this.items.length > 0 && last !== undefined) {
        this.items[0] = last;
        this.siftDown(0);
      }
      drained.push(min);
    }
    return drained;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.compare(this.items[child], this.items[parent]) >= 0) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    const length = this.items.length;
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < length && this.compare(this.items[left], this.items[smallest]) < 0) smallest = left;
      if (right < length && this.compare(this.items[right], this.items[smallest]) < 0) smallest = right;
      if (smallest === parent) return;
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const held = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = held;
  }
}
