/**
 * Binary min-heap keyed by priority. Duplicate values are allowed;
 * Dijkstra skips stale entries on pop.
 */

export interface HeapEntry<T> {
  value: T;
  priority: number;
}

export class MinHeap<T> {
  private items: HeapEntry<T>[] = [];

  get size(): number {
    return this.items.length;
  }

  push(value: T, priority: number): void {
    this.items.push({ value, priority });
    this.siftUp(this.items.length - 1);
  }

  pop(): HeapEntry<T> | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.items.length > 0) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  clear(): void {
    this.items = [];
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.priorityAt(parent) <= this.priorityAt(i)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.items.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.priorityAt(left) < this.priorityAt(smallest)) smallest = left;
      if (right < n && this.priorityAt(right) < this.priorityAt(smallest)) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private priorityAt(index: number): number {
    return this.items[index]?.priority ?? Number.POSITIVE_INFINITY;
  }

  private swap(a: number, b: number): void {
    const itemA = this.items[a];
    const itemB = this.items[b];
    if (itemA === undefined || itemB === undefined) return;
    this.items[a] = itemB;
    this.items[b] = itemA;
  }
}
