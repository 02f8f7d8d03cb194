import type { Heap } from "../heap.js";
import type { SizeHint, StateChangeListener, WindowState } from "../types.js";
import type { WindowSortOptions, WindowStatus } from "../windowSort.js";
import { defaultOrder } from "../order.js";
import { asCapacity, asComparator } from "../validation.js";
import { BinaryHeap } from "./binaryHeap.js";

/**
 * Bounded window plus the fill/drain phase bookkeeping.
 *
 * Owns no upstream cursor: the sync and async sequences pull and hand elements in via
 * `accept`, which lets both share one state machine.
 */
export class WindowBuffer<T> implements WindowStatus {
  readonly capacity: number;
  private readonly heap: Heap<T>;
  private readonly onStateChange: StateChangeListener | undefined;
  private current: WindowState;
  private exhausted = false;
  /** Upstream elements not yet pulled, when the source's length was known up front. */
  private remaining: number | undefined;

  constructor(options: WindowSortOptions<T>, knownLength?: number) {
    this.capacity = asCapacity(options.capacity);
    this.heap = new BinaryHeap<T>(asComparator<T>(options.compare, defaultOrder));
    this.onStateChange = options.onStateChange;
    this.remaining = knownLength;
    // Pass-through never fills; it reports SteadyState until upstream ends.
    this.current = this.capacity === 0 ? "SteadyState" : "Filling";
  }

  get state(): WindowState {
    return this.current;
  }

  get buffered(): number {
    return this.heap.size();
  }

  /** True while another upstream pull is due before the next extraction. */
  wantsMore(): boolean {
    return !this.exhausted && this.heap.size() < Math.max(this.capacity, 1);
  }

  accept(item: T): void {
    this.heap.push(item);
    if (this.remaining !== undefined && this.remaining > 0) this.remaining--;
    if (this.current === "Filling" && this.heap.size() >= this.capacity) this.transition("SteadyState");
  }

  markExhausted(): void {
    if (this.exhausted) return;
    this.exhausted = true;
    this.remaining = 0;
    this.transition(this.heap.size() > 0 ? "Draining" : "Done");
  }

  /** Extracts the window maximum, or reports end-of-sequence once the window is empty. */
  take(): IteratorResult<T, undefined> {
    if (this.heap.size() === 0) return { done: true, value: undefined };
    const value = this.heap.pop()!;
    if (this.exhausted && this.heap.size() === 0) this.transition("Done");
    return { done: false, value };
  }

  /** Drops buffered elements and moves to `Done`. Returns whether upstream was still open. */
  close(): boolean {
    const wasOpen = !this.exhausted;
    this.exhausted = true;
    this.remaining = 0;
    this.heap.clear();
    this.transition("Done");
    return wasOpen;
  }

  sizeHint(): SizeHint {
    const buffered = this.heap.size();
    if (this.remaining === undefined) return { lower: buffered, upper: undefined };
    return { lower: buffered + this.remaining, upper: buffered + this.remaining };
  }

  private transition(to: WindowState): void {
    if (this.current === to) return;
    const from = this.current;
    this.current = to;
    this.onStateChange?.(from, to);
  }
}

export function knownLength(source: unknown): number | undefined {
  if (Array.isArray(source)) return source.length;
  if (source instanceof Set || source instanceof Map) return source.size;
  if (ArrayBuffer.isView(source) && "length" in source && typeof source.length === "number") return source.length;
  return undefined;
}
