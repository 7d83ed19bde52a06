import { describe, it, expect } from "vitest";
import { createRng, normalizeSeed } from "./prng.ts";

describe("prng", () => {
  it("is reproducible for a seed", () => {
    const a = createRng(42);
    const b = createRng(42);
    const xs = Array.from({ length: 5 }, () => a.next());
    const ys = Array.from({ length: 5 }, () => b.next());
    expect(xs).toEqual(ys);
    expect(xs.every((x) => x >= 0 && x < 1)).toBe(true);
  });

  it("differs across seeds", () => {
    expect(createRng(1).next()).not.toBe(createRng(2).next());
  });

  it("keeps below() in range", () => {
    const r = createRng("range");
    for (let i = 0; i < 200; i++) {
      const v = r.below(7);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(7);
    }
    expect(r.below(0)).toBe(0);
  });

  it("pick() throws on an empty list", () => {
    expect(() => createRng(3).pick([])).toThrow("pick() from empty array");
    expect(createRng(3).pick(["only"])).toBe("only");
  });

  it("normalizes numeric and text seeds", () => {
    expect(normalizeSeed("123")).toBe(123);
    expect(normalizeSeed(-1)).toBe(0xffffffff);
    expect(normalizeSeed("abc")).toBe(normalizeSeed("abc"));
    expect(createRng("17").seed).toBe(17);
  });
});
