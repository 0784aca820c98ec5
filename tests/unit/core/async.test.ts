import { describe, expect, it } from "vitest";
import { backoffDelay, processWithConcurrency, withTimeout } from "../../../src/core/async";

describe("backoffDelay", () => {
  it("doubles from the base delay up to the cap", () => {
    expect([1, 2, 3, 4, 5].map((retry) => backoffDelay(retry, 1000, 10000))).toEqual([1000, 2000, 4000, 8000, 10000]);
  });
});

describe("processWithConcurrency", () => {
  it("never runs more than the limit at once and visits every item", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await processWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      seen.push(item);
      active -= 1;
    });

    expect(peak).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });
});

describe("withTimeout", () => {
  it("resolves work that finishes in time", async () => {
    expect(await withTimeout(async () => "done", 50, () => new Error("late"))).toBe("done");
  });

  it("rejects at the deadline and aborts the signal", async () => {
    let signal: AbortSignal | undefined;
    const pending = withTimeout(
      (received) => {
        signal = received;
        return new Promise<string>(() => undefined);
      },
      5,
      () => new Error("late"),
    );

    await expect(pending).rejects.toThrow("late");
    expect(signal?.aborted).toBe(true);
  });
});
