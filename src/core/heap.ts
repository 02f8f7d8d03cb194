/**
 * Window buffer contract.
 * Intended for a max-heap: `peek`/`pop` return the highest-ranked item.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  /** Leaves the heap unchanged when the comparator throws. */
  pop(): T | undefined;
  clear(): void;
}
