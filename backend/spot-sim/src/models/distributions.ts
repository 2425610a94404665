/**
 * Distribution sampling for the price engine
 * Uses seeded RNG for reproducibility
 */

import seedrandom from "seedrandom";

export interface RNG {
  (): number;
}

/**
 * Fresh random source for one generation run.
 * Seeded when a seed is given, auto-seeded otherwise.
 */
export function createRng(seed?: number | string): RNG {
  const prng = seed === undefined ? seedrandom() : seedrandom(seed.toString());
  return () => prng();
}

/** Normal (Box-Muller) */
export function normal(rng: RNG, mu = 0, sigma = 1): number {
  const u1 = rng();
  const u2 = rng();
  if (u1 <= 1e-10) return normal(rng, mu, sigma);
  return mu + sigma * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/** Single trial with success probability p */
export function bernoulli(rng: RNG, p: number): boolean {
  return rng() < p;
}

/** Each item with probability 1/n */
export function pickUniform<T>(rng: RNG, items: readonly T[]): T {
  if (items.length === 0) throw new Error("pickUniform: no items to pick from");
  const idx = Math.min(items.length - 1, Math.floor(rng() * items.length));
  const picked = items[idx];
  if (picked === undefined) throw new Error(`pickUniform: no item at index ${idx}`);
  return picked;
}
