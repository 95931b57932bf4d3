import { describe, expect, it } from "vitest";
import { choleskyDecompose, correlatedNormals, createRng } from "./random.js";

function draws(count: number, draw: () => number): number[] {
  return Array.from({ length: count }, draw);
}

function mean(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

describe("createRng", () => {
  it("repeats its sequence for a seed", () => {
    const a = createRng(7);
    const b = createRng(7);
    expect(draws(5, () => a.next())).toEqual(draws(5, () => b.next()));
    expect(createRng(8).next()).not.toBe(createRng(7).next());
  });

  it("stays inside the open unit interval", () => {
    const rng = createRng(0);
    for (const u of draws(1000, () => rng.next())) {
      expect(u).toBeGreaterThan(0);
      expect(u).toBeLessThan(1);
    }
  });

  it("returns the bound of a zero-width uniform range", () => {
    expect(createRng(3).uniform(0.1, 0.1)).toBe(0.1);
  });

  it("draws standard normals", () => {
    const rng = createRng(11);
    const z = draws(20000, () => rng.gaussian());
    const m = mean(z);
    const variance = mean(z.map((v) => (v - m) ** 2));
    expect(Math.abs(m)).toBeLessThan(0.05);
    expect(Math.abs(variance - 1)).toBeLessThan(0.1);
  });
});

describe("choleskyDecompose", () => {
  it("factors a positive-definite matrix", () => {
    const lower = choleskyDecompose([
      [4, 2],
      [2, 3]
    ]);
    expect(lower?.[0]).toEqual([2, 0]);
    expect(lower?.[1]?.[0]).toBe(1);
    expect(lower?.[1]?.[1]).toBeCloseTo(Math.SQRT2, 12);
  });

  it("returns null when jitter cannot rescue the matrix", () => {
    expect(
      choleskyDecompose([
        [1, 2],
        [2, 1]
      ])
    ).toBeNull();
  });
});

describe("correlatedNormals", () => {
  it("reproduces the target correlation", () => {
    const lower = choleskyDecompose([
      [1, 0.8],
      [0.8, 1]
    ]);
    const rng = createRng(5);
    const pairs = draws(20000, () => {
      const [x = 0, y = 0] = correlatedNormals(lower ?? [], rng);
      return x * y;
    });
    expect(Math.abs(mean(pairs) - 0.8)).toBeLessThan(0.05);
  });
});
