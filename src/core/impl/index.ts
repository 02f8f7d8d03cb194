export { WindowSortIterator } from "./windowSortIterator.js";
export { AsyncWindowSortIterator } from "./asyncWindowSortIterator.js";
