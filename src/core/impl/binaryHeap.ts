import type { Heap } from "../heap.js";
import type { Comparator } from "../types.js";

/**
 * Array-backed binary max-heap: the item ranked highest by `compare` sits at the top.
 * Ties come out in no particular order.
 */
export class BinaryHeap<T> implements Heap<T> {
  private data: T[] = [];

  constructor(private readonly compare: Comparator<T>) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.higher(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  pop(): T | undefined {
    const a = this.data;
    if (a.length === 0) return undefined;
    const top = a[0]!;
    const last = a.pop()!;
    if (a.length) {
      a[0] = last;
      const swaps: Array<[number, number]> = [];
      try {
        this.siftDown(0, swaps);
      } catch (err) {
        // A throwing comparator leaves the heap exactly as it was before the pop.
        for (let k = swaps.length - 1; k >= 0; k--) {
          const [i, j] = swaps[k]!;
          this.swap(i, j);
        }
        a[0] = top;
        a.push(last);
        throw err;
      }
    }
    return top;
  }

  clear(): void {
    this.data = [];
  }

  private higher(i: number, j: number): boolean {
    return this.compare(this.data[i]!, this.data[j]!) > 0;
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    const tmp = a[i]!;
    a[i] = a[j]!;
    a[j] = tmp;
  }

  private siftDown(i: number, swaps: Array<[number, number]>): void {
    const n = this.data.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let largest = i;

      if (l < n && this.higher(l, largest)) largest = l;
      if (r < n && this.higher(r, largest)) largest = r;
      if (largest === i) return;

      this.swap(i, largest);
      swaps.push([i, largest]);
      i = largest;
    }
  }
}
