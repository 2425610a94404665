/**
 * Spot price simulator: regime-switching mean-reverting jump diffusion,
 * generated up front and played back in real time.
 */

export * from "./config/market.js";
export * from "./config/parameters.js";
export * from "./models/types.js";
export * from "./models/distributions.js";
export * from "./models/regimes.js";
export * from "./models/price-engine.js";
export * from "./sim/errors.js";
export * from "./sim/timeline.js";
export * from "./sim/session.js";
export * from "./playback/clock.js";
export * from "./playback/controller.js";
export * from "./reports/generate.js";
