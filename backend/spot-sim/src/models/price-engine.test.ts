/**
 * Unit tests for the spot price step.
 *
 * Stubbed uniforms pin each Box-Muller draw: (0.5, 0) gives +z and
 * (0.5, 0.5) gives -z, with z = sqrt(-2 ln 0.5).
 */

import { describe, it, expect } from "vitest";
import { clampPrice, jumpProbability, step } from "./price-engine.js";
import { createRng, type RNG } from "./distributions.js";
import type { SimulationParameters, VolatilityRegime } from "./types.js";

const DT = 0.2;
const Z = Math.sqrt(-2 * Math.log(0.5));

function sequence(values: number[]): RNG {
  let i = 0;
  return () => values[i++ % values.length] ?? 0;
}

function params(overrides: Partial<SimulationParameters> = {}): SimulationParameters {
  return { maxVolatility: 15, meanReversionStrength: 0.05, jumpFrequency: 2, ...overrides };
}

describe("clampPrice", () => {
  it("clips to [10, 300]", () => {
    expect(clampPrice(5)).toBe(10);
    expect(clampPrice(350)).toBe(300);
    expect(clampPrice(123.4)).toBe(123.4);
  });
});

describe("jumpProbability", () => {
  it("scales frequency per minute by regime and dt", () => {
    expect(jumpProbability("HIGH", params({ jumpFrequency: 3 }), DT)).toBeCloseTo(0.02, 12);
    expect(jumpProbability("LOW", params({ jumpFrequency: 3 }), DT)).toBeCloseTo(0.01, 12);
    expect(jumpProbability("MEDIUM", params({ jumpFrequency: 0 }), DT)).toBe(0);
  });
});

describe("step", () => {
  it("stays at exactly 100 with no volatility and no jumps", () => {
    const rng = createRng(7);
    const point = step(100, "MEDIUM", params({ maxVolatility: 0, jumpFrequency: 0 }), DT, rng, 0);
    expect(point.price).toBe(100);
    expect(point.jumpOccurred).toBe(false);
  });

  it("applies drift toward the mean", () => {
    const point = step(200, "LOW", params({ maxVolatility: 0, jumpFrequency: 0, meanReversionStrength: 0.5 }), DT, createRng(1), 0);
    // 200 + (100 - 200) * 0.5 * 0.2
    expect(point.price).toBeCloseTo(190, 12);
  });

  it("clips at the floor", () => {
    const p = params({ maxVolatility: 50, jumpFrequency: 5 });
    const point = step(11, "HIGH", p, DT, sequence([0.5]), 0);
    expect(point.price).toBe(10);
    expect(point.jumpOccurred).toBe(false);
  });

  it("clips at the ceiling", () => {
    const p = params({ maxVolatility: 50, jumpFrequency: 5 });
    const point = step(295, "HIGH", p, DT, sequence([0.5, 0, 0.5, 0.5, 0.5]), 0);
    expect(point.price).toBe(300);
  });

  it("adds a jump scaled by the effective volatility", () => {
    const p = params({ maxVolatility: 10, jumpFrequency: 5 });
    // diffusion (+z), jump trial 0.01 < 1/30, jump size (+z)
    const point = step(100, "HIGH", p, DT, sequence([0.5, 0, 0.01, 0.5, 0]), 0);
    const effVol = 1.5 * 10;
    const expected = 100 + Z * effVol * 0.5 * Math.sqrt(DT) + Z * effVol * 0.5;
    expect(point.jumpOccurred).toBe(true);
    expect(point.price).toBeCloseTo(expected, 10);
  });

  it("clamps the final sum, not the components", () => {
    const p = params({ maxVolatility: 50, jumpFrequency: 5 });
    // diffusion alone would breach 300; the negative jump brings the sum back inside
    const point = step(290, "HIGH", p, DT, sequence([0.5, 0, 0.01, 0.5, 0.5]), 0);
    const effVol = 1.5 * 50;
    const drift = (100 - 290) * 0.05 * DT;
    const diffusion = Z * effVol * 0.5 * Math.sqrt(DT);
    const jump = -Z * effVol * 0.5;
    expect(290 + drift + diffusion).toBeGreaterThan(300);
    expect(point.price).toBeCloseTo(290 + drift + diffusion + jump, 10);
  });

  it("carries timestamp and regime and is frozen", () => {
    const point = step(100, "LOW", params(), DT, createRng(3), 12.4);
    expect(point.timestamp).toBe(12.4);
    expect(point.regime).toBe("LOW");
    expect(Object.isFrozen(point)).toBe(true);
  });

  it("is deterministic for a seeded source", () => {
    const a = step(120, "HIGH", params(), DT, createRng("same"), 0);
    const b = step(120, "HIGH", params(), DT, createRng("same"), 0);
    expect(a).toEqual(b);
  });

  it("consumes the same draws whatever the parameters", () => {
    const count = (p: SimulationParameters) => {
      let draws = 0;
      const base = createRng(11);
      const rng: RNG = () => {
        draws++;
        return base();
      };
      step(100, "MEDIUM", p, DT, rng, 0);
      return draws;
    };
    expect(count(params({ jumpFrequency: 0 }))).toBe(count(params({ jumpFrequency: 5 })));
  });

  it("reverts a 200 shock faster under stronger mean reversion", () => {
    const ticksToRevert = (strength: number, regime: VolatilityRegime = "MEDIUM") => {
      const rng = createRng("reversion");
      const p = params({ maxVolatility: 1, jumpFrequency: 0, meanReversionStrength: strength });
      let price = 200;
      for (let i = 1; i <= 10_000; i++) {
        price = step(price, regime, p, DT, rng, i * DT).price;
        if (Math.abs(price - 100) < 5) return i;
      }
      return Number.POSITIVE_INFINITY;
    };
    const fast = ticksToRevert(0.4);
    const slow = ticksToRevert(0.01);
    expect(fast).toBeLessThan(slow);
    expect(fast).toBeLessThan(100);
  });
});
