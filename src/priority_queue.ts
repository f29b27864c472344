type Item<T> = {
  value: T;
  priority: number;
};

// Binary min-heap on integer priorities. Equal priorities come out in heap order.
export class PriorityQueue<T> {
  private readonly heap: Item<T>[] = [];

  public push(value: T, priority: number): void {
    this.heap.push({ value, priority });
    this.siftUp(this.heap.length - 1);
  }

  public popMin(): T | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.value;
  }

  public isEmpty(): boolean {
    return this.heap.length === 0;
  }

  public get size(): number {
    return this.heap.length;
  }

  private siftUp(i: number): void {
    const h = this.heap;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (h[parent].priority <= h[i].priority) break;
      [h[parent], h[i]] = [h[i], h[parent]];
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const h = this.heap;
    const n = h.length;
    while (true) {
      const l = 2 * i + 1;
      const r = l + 1;
      let smallest = i;
      if (l < n && h[l].priority < h[smallest].priority) smallest = l;
      if (r < n && h[r].priority < h[smallest].priority) smallest = r;
      if (smallest === i) return;
      [h[smallest], h[i]] = [h[i], h[smallest]];
      i = smallest;
    }
  }
}
