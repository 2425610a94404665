import { describe, it, expect } from "vitest";
import { bernoulli, createRng, normal, pickUniform } from "./distributions.js";

const constant = (value: number) => () => value;

describe("createRng", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = createRng(42);
    const b = createRng("42");
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it("yields values in [0, 1)", () => {
    const rng = createRng("range");
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("normal", () => {
  it("returns the mean exactly when sigma is 0", () => {
    expect(normal(createRng(1), 0, 0)).toBe(0);
    expect(normal(createRng(1), 100, 0)).toBe(100);
  });

  it("follows Box-Muller for fixed uniforms", () => {
    // u1 = 0.5, u2 = 0.5 -> cos(pi) = -1
    expect(normal(constant(0.5), 0, 2)).toBeCloseTo(-2 * Math.sqrt(-2 * Math.log(0.5)), 12);
  });
});

describe("bernoulli", () => {
  it("never fires with p = 0", () => {
    expect(bernoulli(constant(0), 0)).toBe(false);
  });

  it("fires when the draw is below p", () => {
    expect(bernoulli(constant(0.01), 0.02)).toBe(true);
    expect(bernoulli(constant(0.03), 0.02)).toBe(false);
  });
});

describe("pickUniform", () => {
  const items = ["LOW", "MEDIUM", "HIGH"] as const;

  it("maps thirds of [0, 1) onto the items", () => {
    expect(pickUniform(constant(0.1), items)).toBe("LOW");
    expect(pickUniform(constant(0.5), items)).toBe("MEDIUM");
    expect(pickUniform(constant(0.9), items)).toBe("HIGH");
  });

  it("throws on an empty list", () => {
    expect(() => pickUniform(constant(0.5), [])).toThrow("no items");
  });
});
