import type { SizeHint, WindowState } from "../types.js";
import type { AsyncWindowSortSequence, WindowSortOptions } from "../windowSort.js";
import { WindowBuffer, knownLength } from "./windowBuffer.js";

function isAsyncIterable<T>(source: AsyncIterable<T> | Iterable<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}

/**
 * Async counterpart of `WindowSortIterator`. Awaiting upstream is the only suspension point.
 *
 * Overlapping `next()`/`return()` calls run one after another in call order, so a consumer
 * that fires several requests without awaiting still sees a single cursor advance at a time.
 */
export class AsyncWindowSortIterator<T> implements AsyncWindowSortSequence<T> {
  private readonly window: WindowBuffer<T>;
  private readonly cursor: AsyncIterator<T> | Iterator<T>;
  private queue: Promise<void> = Promise.resolve();

  constructor(upstream: AsyncIterable<T> | Iterable<T>, options: WindowSortOptions<T>) {
    this.window = new WindowBuffer(options, knownLength(upstream));
    this.cursor = isAsyncIterable(upstream) ? upstream[Symbol.asyncIterator]() : upstream[Symbol.iterator]();
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

  next(): Promise<IteratorResult<T, undefined>> {
    return this.serialize(async () => {
      while (this.window.wantsMore()) {
        const step = await this.cursor.next();
        if (step.done) {
          this.window.markExhausted();
          break;
        }
        this.window.accept(step.value);
      }
      return this.window.take();
    });
  }

  return(): Promise<IteratorResult<T, undefined>> {
    return this.serialize(async () => {
      if (this.window.close()) await this.cursor.return?.();
      return { done: true, value: undefined };
    });
  }

  [Symbol.asyncIterator](): AsyncWindowSortSequence<T> {
    return this;
  }

  private serialize<R>(task: () => Promise<R>): Promise<R> {
    const result = this.queue.then(task);
    // The caller observes failures through `result`; the queue only tracks completion.
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
