import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "./pool.js";

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("mapWithConcurrency", () => {
  it("keeps input order when later items finish first", async () => {
    const finished: number[] = [];
    const results = await mapWithConcurrency([30, 1, 10], 3, async (ms) => {
      await delay(ms);
      finished.push(ms);
      return ms * 2;
    });
    expect(finished).toEqual([1, 10, 30]);
    expect(results).toEqual([60, 2, 20]);
  });

  it("never runs more than the limit at once", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 2, async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(2);
      inFlight--;
    });
    expect(maxInFlight).toBe(2);
  });

  it("passes the item index", async () => {
    const results = await mapWithConcurrency(["a", "b"], 4, async (item, index) => `${item}${index}`);
    expect(results).toEqual(["a0", "b1"]);
  });

  it("returns an empty array for no items", async () => {
    expect(await mapWithConcurrency([], 8, async () => 1)).toEqual([]);
  });

  it("rejects on the first failure and starts nothing after it", async () => {
    const started: number[] = [];
    const promise = mapWithConcurrency([1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      if (n === 2) throw new Error("boom");
      return n;
    });
    await expect(promise).rejects.toThrow("boom");
    expect(started).toEqual([1, 2]);
  });

  it("rejects invalid limits", async () => {
    await expect(mapWithConcurrency([1], 0, async (n) => n)).rejects.toThrow(RangeError);
  });
});
