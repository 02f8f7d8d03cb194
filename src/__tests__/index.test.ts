import { describe, expect, it } from "vitest";
import { comparing, naturalOrder, reverseOrder, windowSort, windowSortAsync } from "../index.js";

interface Tick {
  seq: number;
  at: number;
}

describe("windowSort", () => {
  it("sorts with the natural order by default", () => {
    expect([...windowSort([4, 2, 3, 1], 2)]).toEqual([4, 3, 2, 1]);
    expect([...windowSort(["b", "d", "a", "c"], 3)]).toEqual(["d", "c", "b", "a"]);
  });

  it("takes a comparator for ascending output", () => {
    expect([...windowSort([1, 4, 2, 3], 2, reverseOrder<number>(naturalOrder))]).toEqual([1, 2, 3, 4]);
  });

  it("restores order of jittered events when the window covers the jitter", () => {
    const ticks: Tick[] = [
      { seq: 1, at: 100 },
      { seq: 3, at: 120 },
      { seq: 2, at: 110 },
      { seq: 4, at: 130 },
      { seq: 6, at: 150 },
      { seq: 5, at: 140 },
    ];
    const oldestFirst = reverseOrder(comparing((t: Tick) => t.at));
    expect([...windowSort(ticks, 2, oldestFirst)].map((t) => t.seq)).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe("windowSortAsync", () => {
  it("sorts an async source", async () => {
    async function* source(): AsyncGenerator<number> {
      yield* [4, 2, 3, 1];
    }
    const out: number[] = [];
    for await (const n of windowSortAsync(source(), 2)) out.push(n);
    expect(out).toEqual([4, 3, 2, 1]);
  });
});
