/**
 * Volatility regimes and their 30-second switching schedule.
 *
 * Each segment draws its regime uniformly and independently of the previous
 * one, so HIGH followed by HIGH is a valid schedule.
 */

import { REGIME_SEGMENT_SECONDS } from "../config/market.js";
import type { RNG } from "./distributions.js";
import { pickUniform } from "./distributions.js";
import type { RegimeProfile, RegimeState, VolatilityRegime } from "./types.js";
import { VOLATILITY_REGIMES } from "./types.js";

export const REGIME_PROFILES: Readonly<Record<VolatilityRegime, RegimeProfile>> = Object.freeze({
  LOW: Object.freeze({ volatilityMultiplier: 0.5, jumpProbabilityMultiplier: 1.0 }),
  MEDIUM: Object.freeze({ volatilityMultiplier: 1.0, jumpProbabilityMultiplier: 1.5 }),
  HIGH: Object.freeze({ volatilityMultiplier: 1.5, jumpProbabilityMultiplier: 2.0 }),
});

/** Tolerance so that 150 * 0.2 counts as reaching 30 */
const BOUNDARY_EPSILON = 1e-9;

export class RegimeScheduler {
  private rng: RNG | null = null;
  private regime: VolatilityRegime | null = null;
  private segmentStart = 0;
  private nextSwitch: number;

  constructor(private readonly segmentSeconds = REGIME_SEGMENT_SECONDS) {
    this.nextSwitch = segmentSeconds;
  }

  /** Draw the regime for [0, segmentSeconds) */
  initialize(rng: RNG): VolatilityRegime {
    this.rng = rng;
    this.regime = pickUniform(rng, VOLATILITY_REGIMES);
    this.segmentStart = 0;
    this.nextSwitch = this.segmentSeconds;
    return this.regime;
  }

  /**
   * Switch regime for every segment boundary elapsedTime has reached.
   * Returns true when at least one boundary was crossed.
   */
  advance(elapsedTime: number): boolean {
    const rng = this.requireRng();
    let switched = false;
    while (elapsedTime + BOUNDARY_EPSILON >= this.nextSwitch) {
      this.regime = pickUniform(rng, VOLATILITY_REGIMES);
      this.segmentStart = this.nextSwitch;
      this.nextSwitch += this.segmentSeconds;
      switched = true;
    }
    return switched;
  }

  currentRegime(): VolatilityRegime {
    if (this.regime === null) throw new Error("RegimeScheduler used before initialize()");
    return this.regime;
  }

  nextSwitchTime(): number {
    return this.nextSwitch;
  }

  segmentStartTime(): number {
    return this.segmentStart;
  }

  state(): RegimeState {
    return {
      currentRegime: this.currentRegime(),
      segmentStartTime: this.segmentStart,
      nextSwitchTime: this.nextSwitch,
    };
  }

  private requireRng(): RNG {
    if (this.rng === null) throw new Error("RegimeScheduler used before initialize()");
    return this.rng;
  }
}
