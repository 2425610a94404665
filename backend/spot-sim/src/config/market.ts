/**
 * Market constants for the spot price model
 * Prices in EUR/MWh, times in seconds
 */

/** Long-run mean the price reverts to */
export const LONG_RUN_MEAN = 100;

export const PRICE_FLOOR = 10;
export const PRICE_CEILING = 300;

export const DEFAULT_INITIAL_PRICE = LONG_RUN_MEAN;

/** One simulation step */
export const TICK_SECONDS = 0.2;
export const RUN_SECONDS = 180;
export const REGIME_SEGMENT_SECONDS = 30;

/** Diffusion std is this fraction of the effective volatility */
export const DIFFUSION_SCALE = 0.5;

/** Jump size std is this fraction of the effective volatility */
export const JUMP_SCALE = 0.5;

/** Parameter bounds, inclusive */
export const PARAMETER_BOUNDS = {
  maxVolatility: { min: 0, max: 50 },
  meanReversionStrength: { min: 0.01, max: 0.5 },
  jumpFrequency: { min: 0, max: 5 },
} as const;

export const DEFAULT_PARAMETERS = {
  maxVolatility: 15,
  meanReversionStrength: 0.05,
  jumpFrequency: 2,
} as const;
