import { describe, it, expect } from "vitest";
import { createRng, seededShuffle } from "../../src/lib/random";

describe("createRng", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = createRng(42);
    const b = createRng(42);
    const seqA = Array.from({ length: 20 }, () => a());
    const seqB = Array.from({ length: 20 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it("stays within [0, 1)", () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("does not touch Math.random", () => {
    const before = Math.random;
    createRng(1)();
    expect(Math.random).toBe(before);
  });
});

describe("seededShuffle", () => {
  const items = ["a", "b", "c", "d", "e", "f", "g", "h", "i", "j"];

  it("returns a permutation without mutating the input", () => {
    const copy = [...items];
    const shuffled = seededShuffle(items, createRng(3));
    expect(items).toEqual(copy);
    expect([...shuffled].sort()).toEqual(items);
  });

  it("is reproducible for a seed", () => {
    expect(seededShuffle(items, createRng(99))).toEqual(seededShuffle(items, createRng(99)));
  });

  it("handles empty and single-item input", () => {
    expect(seededShuffle([], createRng(1))).toEqual([]);
    expect(seededShuffle(["x"], createRng(1))).toEqual(["x"]);
  });
});
