import { describe, expect, it } from "vitest";
import { seededRandom, shuffle } from "./random.js";

describe("shuffle", () => {
  it("returns a permutation without touching the input", () => {
    const input = [1, 2, 3, 4, 5, 6];
    const out = shuffle(input, seededRandom(1));

    expect(input).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...out].sort((a, b) => a - b)).toEqual(input);
  });

  it("swaps every element with the first when the source always returns 0", () => {
    expect(shuffle([1, 2, 3, 4], () => 0)).toEqual([2, 3, 4, 1]);
  });

  it("keeps the order when the source returns values just below 1", () => {
    expect(shuffle([1, 2, 3, 4], () => 0.999999)).toEqual([1, 2, 3, 4]);
  });

  it("handles empty and single-element arrays", () => {
    expect(shuffle([], seededRandom(3))).toEqual([]);
    expect(shuffle(["x"], seededRandom(3))).toEqual(["x"]);
  });
});

describe("seededRandom", () => {
  it("is reproducible for the same seed", () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());

    expect(seqA).toEqual(seqB);
  });

  it("stays within [0, 1)", () => {
    const r = seededRandom(9);
    for (let i = 0; i < 1000; i++) {
      const v = r();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("differs between seeds", () => {
    const a = Array.from({ length: 3 }, seededRandom(1));
    const b = Array.from({ length: 3 }, seededRandom(2));
    expect(a).not.toEqual(b);
  });
});
