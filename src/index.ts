import {
  AsyncWindowSortIterator,
  WindowSortIterator,
  type AsyncWindowSortSequence,
  type Comparator,
  type Orderable,
  type WindowSortSequence,
} from "./core/index.js";

export * from "./core/index.js";

/**
 * Sorts `upstream` within a sliding window of `capacity` elements, highest first.
 *
 * @example
 * ```ts
 * const out = [...windowSort([4, 2, 3, 1], 2)]; // [4, 3, 2, 1]
 * const asc = [...windowSort([1, 4, 2, 3], 2, reverseOrder<number>(naturalOrder))]; // [1, 2, 3, 4]
 * ```
 */
export function windowSort<T extends Orderable>(upstream: Iterable<T>, capacity: number): WindowSortSequence<T>;
export function windowSort<T>(upstream: Iterable<T>, capacity: number, compare: Comparator<T>): WindowSortSequence<T>;
export function windowSort<T>(upstream: Iterable<T>, capacity: number, compare?: Comparator<T>): WindowSortSequence<T> {
  return new WindowSortIterator(upstream, { capacity, compare });
}

/** Same as `windowSort`, for sources that produce elements asynchronously. */
export function windowSortAsync<T extends Orderable>(
  upstream: AsyncIterable<T> | Iterable<T>,
  capacity: number,
): AsyncWindowSortSequence<T>;
export function windowSortAsync<T>(
  upstream: AsyncIterable<T> | Iterable<T>,
  capacity: number,
  compare: Comparator<T>,
): AsyncWindowSortSequence<T>;
export function windowSortAsync<T>(
  upstream: AsyncIterable<T> | Iterable<T>,
  capacity: number,
  compare?: Comparator<T>,
): AsyncWindowSortSequence<T> {
  return new AsyncWindowSortIterator(upstream, { capacity, compare });
}
