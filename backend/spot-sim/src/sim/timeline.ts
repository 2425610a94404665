/**
 * Timeline generator - computes a whole run before any playback
 */

import {
  DEFAULT_INITIAL_PRICE,
  PRICE_CEILING,
  PRICE_FLOOR,
  REGIME_SEGMENT_SECONDS,
  RUN_SECONDS,
  TICK_SECONDS,
} from "../config/market.js";
import { createRng } from "../models/distributions.js";
import { step } from "../models/price-engine.js";
import { RegimeScheduler } from "../models/regimes.js";
import type {
  PricePoint,
  RegimeSegment,
  SimulationParameters,
  SimulationTimeline,
} from "../models/types.js";
import { createChildLogger } from "../log/logger.js";
import { GenerationError, NumericInstabilityError } from "./errors.js";

const log = createChildLogger({ module: "timeline" });

export interface GenerateOptions {
  /** Price the first step starts from (default 100) */
  initialPrice?: number;
  /** Run length in seconds (default 180) */
  durationSeconds?: number;
  tickSeconds?: number;
  regimeSegmentSeconds?: number;
}

export function assertPriceInBounds(index: number, price: number): void {
  if (!(price >= PRICE_FLOOR && price <= PRICE_CEILING)) {
    throw new NumericInstabilityError(index, price);
  }
}

/**
 * Generate the full trajectory for one run.
 * Synchronous and single-pass; either returns every point or throws.
 */
export function generateTimeline(
  parameters: SimulationParameters,
  seed?: number | string,
  options: GenerateOptions = {}
): SimulationTimeline {
  const dt = options.tickSeconds ?? TICK_SECONDS;
  const duration = options.durationSeconds ?? RUN_SECONDS;
  const initialPrice = options.initialPrice ?? DEFAULT_INITIAL_PRICE;
  const tickCount = Math.round(duration / dt);

  try {
    const rng = createRng(seed);
    const scheduler = new RegimeScheduler(options.regimeSegmentSeconds ?? REGIME_SEGMENT_SECONDS);
    scheduler.initialize(rng);

    const points: PricePoint[] = [];
    let price = initialPrice;
    for (let i = 0; i < tickCount; i++) {
      const elapsed = i * dt;
      scheduler.advance(elapsed);
      const point = step(price, scheduler.currentRegime(), parameters, dt, rng, elapsed);
      assertPriceInBounds(i, point.price);
      points.push(point);
      price = point.price;
    }

    log.debug({ seed: seed ?? null, points: points.length }, "Timeline generated");

    return Object.freeze({
      parameters: Object.freeze({ ...parameters }),
      seed: seed ?? null,
      tickSeconds: dt,
      initialPrice,
      points: Object.freeze(points),
    });
  } catch (err) {
    log.error({ err }, "Timeline generation failed");
    throw new GenerationError("Timeline generation failed; run aborted", { cause: err });
  }
}

/** One entry per regime segment, in order */
export function regimeSegments(
  timeline: SimulationTimeline,
  segmentSeconds = REGIME_SEGMENT_SECONDS
): RegimeSegment[] {
  const ticksPerSegment = Math.round(segmentSeconds / timeline.tickSeconds);
  const segments: RegimeSegment[] = [];
  timeline.points.forEach((p, i) => {
    if (i % ticksPerSegment === 0) {
      segments.push({ startIndex: i, startTime: p.timestamp, regime: p.regime });
    }
  });
  return segments;
}
