import { describe, expect, it } from "vitest";
import { work } from "../../src/aggregate/worker-pool.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("work", () => {
  it("processes every item", async () => {
    const seen: number[] = [];

    await work(3, [1, 2, 3, 4, 5], async (item) => {
      await delay(5 - item);
      seen.push(item);
    });

    expect([...seen].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
  });

  it("never exceeds the concurrency limit", async () => {
    let active = 0;
    let peak = 0;

    await work(2, Array.from({ length: 10 }, (_, index) => index), async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(2);
      active -= 1;
    });

    expect(peak).toBe(2);
  });

  it("pulls lazily from an async generator", async () => {
    const pulled: number[] = [];
    async function* source(): AsyncGenerator<number> {
      for (let index = 0; index < 4; index += 1) {
        pulled.push(index);
        yield index;
      }
    }
    const handled: number[] = [];

    await work(1, source(), async (item) => {
      expect(pulled).toHaveLength(item + 1);
      handled.push(item);
    });

    expect(handled).toEqual([0, 1, 2, 3]);
  });

  it("stops pulling after a failure and rethrows it", async () => {
    const handled: number[] = [];

    await expect(
      work(1, [1, 2, 3], async (item) => {
        if (item === 2) {
          throw new Error("item 2 failed");
        }
        handled.push(item);
      }),
    ).rejects.toThrow("item 2 failed");
    expect(handled).toEqual([1]);
  });

  it("propagates a failing source", async () => {
    async function* source(): AsyncGenerator<number> {
      yield 1;
      throw new Error("walk failed");
    }

    await expect(work(2, source(), async () => {})).rejects.toThrow(
      "walk failed",
    );
  });

  it("rejects a non-positive concurrency", async () => {
    await expect(work(0, [1], async () => {})).rejects.toThrow(RangeError);
  });
});
