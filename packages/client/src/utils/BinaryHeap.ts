/**
 * Array-backed binary min-heap ordered by a numeric priority.
 */
export class BinaryHeap<T> {
  private readonly heap: Array<{ value: T; priority: number }> = [];

  private parent(i: number): number {
    return (i - 1) >> 1;
  }

  private left(i: number): number {
    return (i << 1) + 1;
  }

  private right(i: number): number {
    return (i << 1) + 2;
  }

  private priorityAt(i: number): number {
    return this.heap[i]?.priority ?? Number.POSITIVE_INFINITY;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) {
      return;
    }
    this.heap[i] = b;
    this.heap[j] = a;
  }

  private siftUp(pos: number): void {
    while (pos > 0 && this.priorityAt(pos) < this.priorityAt(this.parent(pos))) {
      this.swap(pos, this.parent(pos));
      pos = this.parent(pos);
    }
  }

  private siftDown(pos: number): void {
    for (;;) {
      let min = pos;
      const l = this.left(pos);
      const r = this.right(pos);
      if (l < this.heap.length && this.priorityAt(l) < this.priorityAt(min)) {
        min = l;
      }
      if (r < this.heap.length && this.priorityAt(r) < this.priorityAt(min)) {
        min = r;
      }
      if (min === pos) {
        return;
      }
      this.swap(pos, min);
      pos = min;
    }
  }

  push(value: T, priority: number): void {
    this.heap.push({ value, priority });
    this.siftUp(this.heap.length - 1);
  }

  pop(): T | undefined {
    const root = this.heap[0];
    const last = this.heap.pop();
    if (root === undefined || last === undefined) {
      return undefined;
    }
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return root.value;
  }

  peekPriority(): number | undefined {
    return this.heap[0]?.priority;
  }

  get size(): number {
    return this.heap.length;
  }

  clear(): void {
    this.heap.length = 0;
  }
}
