import { describe, it, expect } from "vitest";
import { defaultConcurrency, forEachSettled } from "../src/utils";

describe("forEachSettled", () => {
  it("reports every item in completion order, including failures", async () => {
    const settled: Array<[number, string]> = [];

    await forEachSettled(
      [30, 0, 10],
      3,
      async (wait) => {
        await new Promise((resolve) => setTimeout(resolve, wait));
        if (wait === 10) throw new Error("ten");
        return wait * 2;
      },
      (item, result) => {
        settled.push([item, result.status]);
      }
    );

    expect(settled).toEqual([
      [0, "fulfilled"],
      [10, "rejected"],
      [30, "fulfilled"],
    ]);
  });

  it("handles an empty list", async () => {
    const settled: number[] = [];

    await forEachSettled<number, number>([], 4, async () => 1, (item: number) => settled.push(item));

    expect(settled).toEqual([]);
  });
});

describe("defaultConcurrency", () => {
  it("stays within 5 and 32", () => {
    const size = defaultConcurrency();
    expect(size).toBeGreaterThanOrEqual(5);
    expect(size).toBeLessThanOrEqual(32);
  });
});
