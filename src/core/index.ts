export type { Comparator, SizeHint, StateChangeListener, WindowState } from "./types.js";
export type { Heap } from "./heap.js";
export type { AsyncWindowSortSequence, WindowSortOptions, WindowSortSequence, WindowStatus } from "./windowSort.js";
export { WindowSortError, isWindowSortError, type WindowSortErrorCode } from "./errors.js";
export { comparing, defaultOrder, naturalOrder, reverseOrder, type Orderable } from "./order.js";
export * from "./impl/index.js";
