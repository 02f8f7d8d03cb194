import type { SizeHint, WindowState } from "../types.js";
import type { WindowSortOptions, WindowSortSequence } from "../windowSort.js";
import { WindowBuffer, knownLength } from "./windowBuffer.js";

/**
 * Sorts a synchronous iterable within a sliding window of `capacity` elements.
 *
 * Each `next()` tops the window up from upstream, then yields its maximum. Once upstream
 * ends the remaining window drains in order. An upstream throw escapes `next()` as is;
 * whatever was already buffered stays put for later calls.
 */
export class WindowSortIterator<T> implements WindowSortSequence<T> {
  private readonly window: WindowBuffer<T>;
  private readonly cursor: Iterator<T>;

  constructor(upstream: Iterable<T>, options: WindowSortOptions<T>) {
    this.window = new WindowBuffer(options, knownLength(upstream));
    this.cursor = upstream[Symbol.iterator]();
  }

  get capacity(): number {
    return this.window.capacity;
  }

  get state(): WindowState {
    return this.window.state;
  }

  get buffered(): number {
    return this.window.buffered;
  }

  sizeHint(): SizeHint {
    return this.window.sizeHint();
  }

  next(): IteratorResult<T, undefined> {
    while (this.window.wantsMore()) {
      const step = this.cursor.next();
      if (step.done) {
        this.window.markExhausted();
        break;
      }
      this.window.accept(step.value);
    }
    return this.window.take();
  }

  return(): IteratorResult<T, undefined> {
    if (this.window.close()) this.cursor.return?.();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): WindowSortSequence<T> {
    return this;
  }
}
