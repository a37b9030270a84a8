import { describe, it, expect } from "vitest";
import { runPool } from "./workerPool.js";

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("runPool", () => {
  it("should return results in input order whatever the completion order", async () => {
    const delays = [30, 5, 20, 1, 10];

    const results = await runPool(delays, 3, async (ms, index) => {
      await tick(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:5", "2:20", "3:1", "4:10"]);
  });

  it("should never run more workers than the concurrency bound", async () => {
    let inFlight = 0;
    let peak = 0;

    await runPool(Array.from({ length: 8 }, (_, i) => i), 2, async (item) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick(item % 3);
      inFlight--;
      return item;
    });

    expect(peak).toBe(2);
  });

  it("should handle an empty list", async () => {
    await expect(runPool([], 4, async (item) => item)).resolves.toEqual([]);
  });

  it("should reject a non-positive or fractional concurrency", async () => {
    await expect(runPool([1], 0, async (item) => item)).rejects.toThrow(RangeError);
    await expect(runPool([1], 1.5, async (item) => item)).rejects.toThrow(RangeError);
  });
});
