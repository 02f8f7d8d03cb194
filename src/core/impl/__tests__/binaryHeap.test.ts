import { describe, expect, it } from "vitest";
import { BinaryHeap } from "../binaryHeap.js";
import { naturalOrder, reverseOrder } from "../../order.js";
import type { Comparator } from "../../types.js";

/** Natural order that throws on its `failOn`-th call only. */
function failingOnce(failOn: number): Comparator<number> {
  let calls = 0;
  return (a, b) => {
    calls++;
    if (calls === failOn) throw new Error("compare failed");
    return a - b;
  };
}

function drain<T>(heap: BinaryHeap<T>): T[] {
  const out: T[] = [];
  while (heap.size() > 0) out.push(heap.pop()!);
  return out;
}

describe("BinaryHeap", () => {
  it("pops highest first by comparator", () => {
    const heap = new BinaryHeap<number>(naturalOrder);
    for (const n of [5, 1, 3, 2, 4]) heap.push(n);
    expect(heap.size()).toBe(5);
    expect(heap.peek()).toBe(5);
    expect(drain(heap)).toEqual([5, 4, 3, 2, 1]);
  });

  it("acts as a min-heap under a reversed comparator", () => {
    const heap = new BinaryHeap<number>(reverseOrder<number>(naturalOrder));
    for (const n of [5, 1, 3, 2, 4]) heap.push(n);
    expect(drain(heap)).toEqual([1, 2, 3, 4, 5]);
  });

  it("keeps duplicates", () => {
    const heap = new BinaryHeap<number>(naturalOrder);
    for (const n of [2, 7, 2, 7, 1]) heap.push(n);
    expect(drain(heap)).toEqual([7, 7, 2, 2, 1]);
  });

  it("returns undefined when empty and can be cleared", () => {
    const heap = new BinaryHeap<string>(naturalOrder);
    expect(heap.pop()).toBeUndefined();
    expect(heap.peek()).toBeUndefined();

    heap.push("b");
    heap.push("a");
    expect(heap.size()).toBe(2);

    heap.clear();
    expect(heap.size()).toBe(0);
    expect(heap.pop()).toBeUndefined();
  });

  it("stays ordered across interleaved pushes and pops", () => {
    const heap = new BinaryHeap<number>(naturalOrder);
    heap.push(3);
    heap.push(9);
    expect(heap.pop()).toBe(9);
    heap.push(1);
    heap.push(6);
    expect(heap.pop()).toBe(6);
    expect(heap.pop()).toBe(3);
    heap.push(4);
    expect(drain(heap)).toEqual([4, 1]);
  });

  it("keeps every item when the comparator throws during pop", () => {
    // Pushing 1, 2, 3 takes two comparisons; the first sift-down comparison fails.
    const heap = new BinaryHeap<number>(failingOnce(3));
    for (const n of [1, 2, 3]) heap.push(n);

    expect(() => heap.pop()).toThrow("compare failed");
    expect(heap.size()).toBe(3);
    expect(heap.peek()).toBe(3);
    expect(drain(heap)).toEqual([3, 2, 1]);
  });

  it("restores swapped items when a deeper comparison throws", () => {
    // Seven pushes of ascending values cost 10 comparisons; the pop below swaps
    // the root with its right child and fails on the next level down.
    const heap = new BinaryHeap<number>(failingOnce(13));
    for (const n of [1, 2, 3, 4, 5, 6, 7]) heap.push(n);

    expect(() => heap.pop()).toThrow("compare failed");
    expect(heap.size()).toBe(7);
    expect(drain(heap)).toEqual([7, 6, 5, 4, 3, 2, 1]);
  });
});
