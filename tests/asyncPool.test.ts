import { describe, it, expect } from "vitest";
import { asyncPool, unwrapSettled } from "../src/utils/asyncPool.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("asyncPool", () => {
  it("keeps input order and never exceeds the limit", async () => {
    let active = 0;
    let peak = 0;
    const results = await asyncPool(2, [1, 2, 3, 4, 5], async (n) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
      return n * 10;
    });
    expect(unwrapSettled(results)).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it("records failures and runs the remaining items", async () => {
    const seen: string[] = [];
    const results = await asyncPool(1, ["a", "bad", "c"], async (s) => {
      seen.push(s);
      if (s === "bad") throw new Error("no");
      return s.toUpperCase();
    });
    expect(seen).toEqual(["a", "bad", "c"]);
    expect(results[0]).toEqual({ ok: true, value: "A" });
    expect(results[1].ok).toBe(false);
    expect(results[2]).toEqual({ ok: true, value: "C" });
    expect(() => unwrapSettled(results)).toThrow("no");
  });

  it("returns an empty list for no items", async () => {
    expect(await asyncPool(4, [], async () => 1)).toEqual([]);
  });
});
