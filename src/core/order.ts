import type { Comparator } from "./types.js";
import { WindowSortError } from "./errors.js";

/** Values `naturalOrder` knows how to compare. */
export type Orderable = number | bigint | string | boolean | Date;

function sign(lt: boolean, gt: boolean): number {
  return lt ? -1 : gt ? 1 : 0;
}

function compareUnknown(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return sign(a < b, a > b);
  if (typeof a === "bigint" && typeof b === "bigint") return sign(a < b, a > b);
  if (typeof a === "string" && typeof b === "string") return sign(a < b, a > b);
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  if (a instanceof Date && b instanceof Date) return sign(a.getTime() < b.getTime(), a.getTime() > b.getTime());
  throw new WindowSortError("INCOMPARABLE_ELEMENTS", `cannot compare ${describe(a)} with ${describe(b)}`, [a, b]);
}

function describe(v: unknown): string {
  if (v === null) return "null";
  if (v instanceof Date) return "Date";
  return typeof v;
}

/**
 * Ascending comparator over primitives and dates. Strings compare by UTF-16 code units,
 * not locale. NaN compares equal to everything.
 */
export const naturalOrder: <T extends Orderable>(a: T, b: T) => number = compareUnknown;

/** Default comparator for element types the caller did not supply an order for. */
export const defaultOrder: Comparator<unknown> = compareUnknown;

/** Flips a comparator, turning the max-first window into a min-first one. */
export function reverseOrder<T>(compare: Comparator<T>): Comparator<T> {
  return (a, b) => compare(b, a);
}

/**
 * Orders elements by a derived key, e.g. `comparing((e: Event) => e.timestamp)`.
 */
export function comparing<T, K extends Orderable>(key: (item: T) => K): Comparator<T>;
export function comparing<T, K>(key: (item: T) => K, compare: Comparator<K>): Comparator<T>;
export function comparing<T, K>(key: (item: T) => K, compare: Comparator<K> = defaultOrder): Comparator<T> {
  return (a, b) => compare(key(a), key(b));
}
