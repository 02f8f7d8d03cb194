/** Shared core types used by module contracts. */

/**
 * Orders two elements like `Array.sort`: a positive result means `a` ranks above `b`
 * and is yielded first by a window sort.
 */
export type Comparator<T> = (a: T, b: T) => number;

/** Phase of a window sort. `Done` is terminal. */
export type WindowState = "Filling" | "SteadyState" | "Draining" | "Done";

export interface SizeHint {
  lower: number;
  /** Undefined when the upstream length is unknown (generators, infinite sources). */
  upper: number | undefined;
}

export type StateChangeListener = (from: WindowState, to: WindowState) => void;
