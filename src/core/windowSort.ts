import type { Comparator, SizeHint, StateChangeListener, WindowState } from "./types.js";

export interface WindowSortOptions<T> {
  /** Maximum number of elements held back for reordering. 0 means pass-through. */
  capacity: number;
  /** Defaults to `defaultOrder`; highest-ranked element is yielded first. */
  compare?: Comparator<T>;
  /** Called on every phase transition, after the new phase is in effect. */
  onStateChange?: StateChangeListener;
}

/** Read-only view of a window's progress, shared by the sync and async sequences. */
export interface WindowStatus {
  readonly capacity: number;
  readonly state: WindowState;
  /** Elements pulled from upstream but not yet yielded. */
  readonly buffered: number;
  sizeHint(): SizeHint;
}

/**
 * Lazy sequence that reorders upstream elements within a sliding window.
 *
 * Consumption is destructive: iterating again continues where the last iteration stopped.
 */
export interface WindowSortSequence<T> extends WindowStatus, IterableIterator<T> {
  next(): IteratorResult<T, undefined>;
  /** Releases buffered elements and closes the upstream iterator. */
  return(): IteratorResult<T, undefined>;
  [Symbol.iterator](): WindowSortSequence<T>;
}

export interface AsyncWindowSortSequence<T> extends WindowStatus, AsyncIterableIterator<T> {
  next(): Promise<IteratorResult<T, undefined>>;
  return(): Promise<IteratorResult<T, undefined>>;
  [Symbol.asyncIterator](): AsyncWindowSortSequence<T>;
}
