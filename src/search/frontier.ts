/**
 * Frontier containers for graph search
 */

interface HeapEntry<T> {
  item: T;
  priority: number;
  order: number; // insertion sequence, breaks priority ties
}

/**
 * Binary min-heap keyed by priority. Items of equal priority leave in
 * insertion order.
 */
export class PriorityQueue<T> {
  private items: HeapEntry<T>[] = [];
  private inserted = 0;

  push(item: T, priority: number): void {
    this.items.push({ item, priority, order: this.inserted++ });
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result.item;
  }

  peek(): T | undefined {
    return this.items[0]?.item;
  }

  peekPriority(): number | undefined {
    return this.items[0]?.priority;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  private precedes(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.order < b.order);
  }

  /**
   * Move the entry at `index` towards the root, shifting each parent it
   * precedes down into the hole it leaves.
   */
  private bubbleUp(index: number): void {
    const entry = this.items[index];
    let hole = index;

    while (hole > 0) {
      const parent = (hole - 1) >> 1;
      if (!this.precedes(entry, this.items[parent])) break;
      this.items[hole] = this.items[parent];
      hole = parent;
    }

    this.items[hole] = entry;
  }

  /**
   * Move the entry at `index` towards the leaves, promoting the earlier
   * child while it precedes the entry.
   */
  private bubbleDown(index: number): void {
    const entry = this.items[index];
    const count = this.items.length;
    let hole = index;
    let child = 2 * hole + 1;

    while (child < count) {
      const sibling = child + 1;
      if (sibling < count && this.precedes(this.items[sibling], this.items[child])) {
        child = sibling;
      }
      if (!this.precedes(this.items[child], entry)) break;

      this.items[hole] = this.items[child];
      hole = child;
      child = 2 * hole + 1;
    }

    this.items[hole] = entry;
  }
}

// Dequeued slots are compacted once they outnumber the live items
const COMPACT_THRESHOLD = 1024;

/**
 * FIFO queue with amortised O(1) dequeue
 */
export class Queue<T> {
  private items: T[] = [];
  private head = 0;

  enqueue(item: T): void {
    this.items.push(item);
  }

  dequeue(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  isEmpty(): boolean {
    return this.head >= this.items.length;
  }

  size(): number {
    return this.items.length - this.head;
  }
}
