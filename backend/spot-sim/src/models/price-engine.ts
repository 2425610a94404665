/**
 * Spot price step: mean reversion + diffusion + jump diffusion
 */

import {
  DIFFUSION_SCALE,
  JUMP_SCALE,
  LONG_RUN_MEAN,
  PRICE_CEILING,
  PRICE_FLOOR,
} from "../config/market.js";
import type { RNG } from "./distributions.js";
import { bernoulli, normal } from "./distributions.js";
import { REGIME_PROFILES } from "./regimes.js";
import type { PricePoint, SimulationParameters, VolatilityRegime } from "./types.js";

export function clampPrice(price: number): number {
  return Math.min(PRICE_CEILING, Math.max(PRICE_FLOOR, price));
}

/** Jump probability for one step of dt seconds */
export function jumpProbability(
  regime: VolatilityRegime,
  params: SimulationParameters,
  dt: number
): number {
  return (params.jumpFrequency * REGIME_PROFILES[regime].jumpProbabilityMultiplier * dt) / 60;
}

/**
 * Compute the next price point.
 *
 * Random draws per call are always: diffusion normal, jump trial, jump size
 * normal. The jump size is drawn even when no jump occurs, so runs with
 * different parameters consume the same stream.
 *
 * The bounds clip the final sum only.
 */
export function step(
  currentPrice: number,
  regime: VolatilityRegime,
  params: SimulationParameters,
  dt: number,
  rng: RNG,
  timestamp: number
): PricePoint {
  const profile = REGIME_PROFILES[regime];
  const effVol = profile.volatilityMultiplier * params.maxVolatility;

  const drift = (LONG_RUN_MEAN - currentPrice) * params.meanReversionStrength * dt;
  const diffusion = normal(rng, 0, effVol * DIFFUSION_SCALE) * Math.sqrt(dt);

  const jumpOccurred = bernoulli(rng, jumpProbability(regime, params, dt));
  const jumpDraw = normal(rng, 0, JUMP_SCALE * effVol);
  const jumpSize = jumpOccurred ? jumpDraw : 0;

  const price = clampPrice(currentPrice + drift + diffusion + jumpSize);

  return Object.freeze({ timestamp, price, regime, jumpOccurred });
}
