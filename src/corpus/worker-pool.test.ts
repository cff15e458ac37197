import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "./worker-pool.js";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("keeps results in input order when tasks finish out of order", async () => {
    const finished: number[] = [];
    const results = await mapWithConcurrency([30, 5, 20, 1], 4, async (ms, index) => {
      await delay(ms);
      finished.push(index);
      return ms * 2;
    });

    expect(results).toEqual([60, 10, 40, 2]);
    expect(finished).not.toEqual([0, 1, 2, 3]);
  });

  it("never runs more than the limit at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const progress: Array<[number, number]> = [];

    await mapWithConcurrency(
      Array.from({ length: 7 }, (_, i) => i),
      2,
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
      },
      (done, total) => progress.push([done, total]),
    );

    expect(peak).toBe(2);
    expect(progress.at(-1)).toEqual([7, 7]);
    expect(progress).toHaveLength(7);
  });

  it("handles an empty list", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
