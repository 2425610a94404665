/**
 * Run report generation - JSON + Markdown
 */

import { PRICE_CEILING, PRICE_FLOOR } from "../config/market.js";
import type { RegimeSegment, SimulationParameters, SimulationTimeline } from "../models/types.js";
import type { PlaybackState } from "../playback/controller.js";
import { regimeSegments } from "../sim/timeline.js";

export interface TimelineSummary {
  points: number;
  durationSeconds: number;
  firstPrice: number;
  lastPrice: number;
  minPrice: number;
  maxPrice: number;
  meanPrice: number;
  stdDevPrice: number;
  jumpCount: number;
  /** Points sitting exactly on the floor */
  timeAtFloor: number;
  /** Points sitting exactly on the ceiling */
  timeAtCeiling: number;
  regimeSegments: RegimeSegment[];
}

/** How far real-time playback got; absent when the run was only generated */
export interface PlaybackOutcome {
  state: PlaybackState;
  emittedCount: number;
}

export interface ReportJson {
  meta: {
    timestamp: string;
    seed: number | string | null;
    tickSeconds: number;
    initialPrice: number;
  };
  parameters: SimulationParameters;
  playback: (PlaybackOutcome & { playedSeconds: number }) | null;
  results: TimelineSummary;
}

export function summarizeTimeline(timeline: SimulationTimeline): TimelineSummary {
  const prices = timeline.points.map((p) => p.price);
  const n = prices.length;
  const mean = n > 0 ? prices.reduce((a, b) => a + b, 0) / n : 0;
  const variance = n > 0 ? prices.reduce((s, p) => s + (p - mean) ** 2, 0) / n : 0;

  return {
    points: n,
    durationSeconds: n * timeline.tickSeconds,
    firstPrice: prices[0] ?? timeline.initialPrice,
    lastPrice: prices[n - 1] ?? timeline.initialPrice,
    minPrice: n > 0 ? Math.min(...prices) : timeline.initialPrice,
    maxPrice: n > 0 ? Math.max(...prices) : timeline.initialPrice,
    meanPrice: mean,
    stdDevPrice: Math.sqrt(variance),
    jumpCount: timeline.points.filter((p) => p.jumpOccurred).length,
    timeAtFloor: prices.filter((p) => p === PRICE_FLOOR).length,
    timeAtCeiling: prices.filter((p) => p === PRICE_CEILING).length,
    regimeSegments: regimeSegments(timeline),
  };
}

export function toJson(
  timeline: SimulationTimeline,
  summary = summarizeTimeline(timeline),
  playback: PlaybackOutcome | null = null
): ReportJson {
  return {
    meta: {
      timestamp: new Date().toISOString(),
      seed: timeline.seed,
      tickSeconds: timeline.tickSeconds,
      initialPrice: timeline.initialPrice,
    },
    parameters: { ...timeline.parameters },
    playback: playback
      ? { ...playback, playedSeconds: playback.emittedCount * timeline.tickSeconds }
      : null,
    results: summary,
  };
}

export function toMarkdown(
  timeline: SimulationTimeline,
  summary = summarizeTimeline(timeline),
  playback: PlaybackOutcome | null = null
): string {
  const fmt = (n: number, d = 2) => n.toFixed(d);
  const { parameters } = timeline;
  const played = playback
    ? `| State | ${playback.state} |
| Points played | ${playback.emittedCount} / ${summary.points} |
| Time played | ${fmt(playback.emittedCount * timeline.tickSeconds, 1)}s |`
    : "| State | not played |";

  return `# Spot Price Simulation Report

**Generated:** ${new Date().toISOString()}

## Configuration

| Parameter | Value |
|-----------|-------|
| Seed | ${timeline.seed ?? "(random)"} |
| Max volatility | ${parameters.maxVolatility} EUR/MWh |
| Mean reversion strength | ${parameters.meanReversionStrength} /s |
| Jump frequency | ${parameters.jumpFrequency} /min |
| Tick | ${timeline.tickSeconds}s |
| Initial price | ${fmt(timeline.initialPrice)} EUR/MWh |

## Playback

| Metric | Value |
|--------|-------|
${played}

## Results

| Metric | Value |
|--------|-------|
| Points | ${summary.points} |
| Duration | ${fmt(summary.durationSeconds, 1)}s |
| First / last price | ${fmt(summary.firstPrice)} / ${fmt(summary.lastPrice)} |
| Min / max price | ${fmt(summary.minPrice)} / ${fmt(summary.maxPrice)} |
| Mean price | ${fmt(summary.meanPrice)} |
| Std dev | ${fmt(summary.stdDevPrice)} |
| Jumps | ${summary.jumpCount} |
| Ticks at floor / ceiling | ${summary.timeAtFloor} / ${summary.timeAtCeiling} |

## Regime Schedule

| Start (s) | Tick | Regime |
|-----------|------|--------|
${summary.regimeSegments
  .map((s) => `| ${fmt(s.startTime, 1)} | ${s.startIndex} | ${s.regime} |`)
  .join("\n")}
`;
}
