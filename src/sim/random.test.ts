import { describe, expect, it } from "vitest";
import { createRandomSource, deriveSeed, hashStringToSeed, normal, randomInt, uniform, type RandomSource } from "./random";

function fixed(next: number, gaussian = 0): RandomSource {
  return { next: () => next, gaussian: () => gaussian };
}

describe("random", () => {
  it("replays the same stream for the same seed", () => {
    const a = createRandomSource(42);
    const b = createRandomSource(42);
    const drawsA = Array.from({ length: 5 }, () => a.next());
    const drawsB = Array.from({ length: 5 }, () => b.next());
    expect(drawsA).toEqual(drawsB);
  });

  it("keeps uniform draws in [0, 1)", () => {
    const rng = createRandomSource(7);
    for (let i = 0; i < 5000; i += 1) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("derives distinct seeds per stream", () => {
    expect(deriveSeed(1, 0)).not.toBe(deriveSeed(1, 1));
    expect(deriveSeed(1, 0)).not.toBe(deriveSeed(2, 0));
    expect(deriveSeed(1, "soft:10:0")).toBe(hashStringToSeed("1:soft:10:0"));
  });

  it("produces standard normal draws", () => {
    const rng = createRandomSource(1234);
    const n = 20000;
    const draws = Array.from({ length: n }, () => rng.gaussian());
    const avg = draws.reduce((s, v) => s + v, 0) / n;
    const variance = draws.reduce((s, v) => s + (v - avg) ** 2, 0) / (n - 1);
    expect(Math.abs(avg)).toBeLessThan(0.05);
    expect(Math.abs(Math.sqrt(variance) - 1)).toBeLessThan(0.05);
  });

  it("scales helpers from the underlying draws", () => {
    expect(uniform(fixed(0.5), 85, 100)).toBe(92.5);
    expect(normal(fixed(0, 2), 12000, 400)).toBe(12800);
    expect(randomInt(fixed(0), 3, 6)).toBe(3);
    expect(randomInt(fixed(0.5), 3, 6)).toBe(5);
    expect(randomInt(fixed(0.9999), 3, 6)).toBe(6);
  });
});
