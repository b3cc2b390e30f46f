import { describe, it, expect } from "vitest";
import { SeededRng } from "@scalargrad/core";

describe("SeededRng", () => {
  it("produces deterministic sequences", () => {
    const rng1 = new SeededRng(42);
    const rng2 = new SeededRng(42);

    const seq1 = Array.from({ length: 10 }, () => rng1.next());
    const seq2 = Array.from({ length: 10 }, () => rng2.next());

    expect(seq1).toEqual(seq2);
  });

  it("produces values in [0, 1)", () => {
    const rng = new SeededRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("uniform and int stay in range", () => {
    const rng = new SeededRng(9);
    for (let i = 0; i < 500; i++) {
      const u = rng.uniform(-1, 1);
      expect(u).toBeGreaterThanOrEqual(-1);
      expect(u).toBeLessThan(1);
      const k = rng.int(5);
      expect(Number.isInteger(k)).toBe(true);
      expect(k).toBeGreaterThanOrEqual(0);
      expect(k).toBeLessThan(5);
    }
  });

  it("shuffle returns a permutation and leaves the input alone", () => {
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = new SeededRng(1).shuffle(items);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("different seeds give different sequences", () => {
    const rng7 = new SeededRng(7);
    const rng8 = new SeededRng(8);
    const a = Array.from({ length: 5 }, () => rng7.next());
    const b = Array.from({ length: 5 }, () => rng8.next());
    expect(a).not.toEqual(b);
  });

  it("nextGauss has roughly zero mean", () => {
    const rng = new SeededRng(42);
    let sum = 0;
    const n = 10000;
    for (let i = 0; i < n; i++) sum += rng.nextGauss();
    expect(Math.abs(sum / n)).toBeLessThan(0.1);
  });
});
