/**
 * Spot price simulation types
 */

export type VolatilityRegime = "LOW" | "MEDIUM" | "HIGH";

export const VOLATILITY_REGIMES: readonly VolatilityRegime[] = ["LOW", "MEDIUM", "HIGH"];

export interface RegimeProfile {
  /** Scales maxVolatility */
  volatilityMultiplier: number;
  /** Scales jumpFrequency */
  jumpProbabilityMultiplier: number;
}

export interface SimulationParameters {
  /** EUR/MWh, [0, 50] */
  readonly maxVolatility: number;
  /** Per second, [0.01, 0.5] */
  readonly meanReversionStrength: number;
  /** Jumps per minute, [0, 5] */
  readonly jumpFrequency: number;
}

export interface RegimeState {
  currentRegime: VolatilityRegime;
  segmentStartTime: number;
  nextSwitchTime: number;
}

export interface PricePoint {
  /** Seconds since run start */
  readonly timestamp: number;
  /** EUR/MWh */
  readonly price: number;
  readonly regime: VolatilityRegime;
  readonly jumpOccurred: boolean;
}

export interface SimulationTimeline {
  readonly parameters: SimulationParameters;
  /** Seed the run was generated from, null when auto-seeded */
  readonly seed: number | string | null;
  readonly tickSeconds: number;
  readonly initialPrice: number;
  readonly points: readonly PricePoint[];
}

export interface RegimeSegment {
  startIndex: number;
  startTime: number;
  regime: VolatilityRegime;
}
