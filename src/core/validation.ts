import type { Comparator } from "./types.js";
import { WindowSortError } from "./errors.js";

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isSafeInteger(v) ? v : undefined;
}

export function asCapacity(v: unknown): number {
  const n = asInt(v);
  if (n === undefined || n < 0) {
    throw new WindowSortError("INVALID_CAPACITY", "must be a non-negative safe integer", v);
  }
  return n;
}

export function asComparator<T>(v: Comparator<T> | undefined, fallback: Comparator<T>): Comparator<T> {
  if (v === undefined) return fallback;
  if (typeof v !== "function") {
    throw new WindowSortError("INVALID_COMPARATOR", "must be a function", v);
  }
  return v;
}
