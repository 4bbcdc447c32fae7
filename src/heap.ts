// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * A binary min-heap. Used as the priority queue for Dijkstra and for the scheduler's frontier.
 */

/** Negative if a should be popped before b. */
export type Comparator<T> = (a: T, b: T) => number;

class BinaryHeap<T> {
  private items: T[] = [];

  constructor(private readonly compare: Comparator<T>) {}

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(item: T) {
    const items = this.items;
    items.push(item);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(items[i], items[parent]) >= 0) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  /** Returns the smallest item without removing it, or undefined if the heap is empty. */
  peek(): T | undefined {
    return this.items[0];
  }

  /** Removes and returns the smallest item, or undefined if the heap is empty. */
  pop(): T | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (items.length === 0 || last === undefined) {
      return top;
    }

    items[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < items.length && this.compare(items[left], items[smallest]) < 0) {
        smallest = left;
      }
      if (right < items.length && this.compare(items[right], items[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === i) break;
      [items[i], items[smallest]] = [items[smallest], items[i]];
      i = smallest;
    }
    return top;
  }
}

export default BinaryHeap;
