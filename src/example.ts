import { comparing, reverseOrder, windowSortAsync } from "./index.js";

interface Reading {
  sensor: string;
  ts: number;
}

const windowSize = Number(process.env.WINDOW_SIZE ?? 4);

/** Readings with up to 3 ticks of arrival jitter. */
async function* jittered(count: number): AsyncGenerator<Reading> {
  for (let i = 0; i < count; i++) {
    const jitter = (i * 7) % 4;
    yield { sensor: `s${i % 3}`, ts: i * 10 - jitter * 10 };
  }
}

const byTime = reverseOrder(comparing((r: Reading) => r.ts));
const sorted = windowSortAsync(jittered(12), windowSize, byTime);

for await (const r of sorted) {
  console.log(`${r.ts}\t${r.sensor}`);
}

console.log(`drained with window ${sorted.capacity}`);
