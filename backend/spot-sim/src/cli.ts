#!/usr/bin/env node
/**
 * Spot price simulation CLI
 * npm run sim -- --seed 42 --max-volatility 20 --jump-frequency 3
 */

import { Command } from "commander";
import { mkdir, writeFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";

import { env } from "./config/env.js";
import { parseParameters } from "./config/parameters.js";
import type {
  PricePoint,
  SimulationParameters,
  SimulationTimeline,
  VolatilityRegime,
} from "./models/types.js";
import type { OverrunWarning, PlaybackSink } from "./playback/controller.js";
import type { PlaybackOutcome } from "./reports/generate.js";
import { summarizeTimeline, toJson, toMarkdown } from "./reports/generate.js";
import { ParameterValidationError } from "./sim/errors.js";
import { SimulationSession } from "./sim/session.js";
import { generateTimeline } from "./sim/timeline.js";

function formatPoint(point: PricePoint): string {
  const jump = point.jumpOccurred ? "  JUMP" : "";
  return `t=${point.timestamp.toFixed(1).padStart(5)}s  ${point.price.toFixed(2).padStart(7)} EUR/MWh  [${point.regime}]${jump}`;
}

function readParameters(
  maxVolatility: unknown,
  meanReversionStrength: unknown,
  jumpFrequency: unknown
): SimulationParameters | null {
  try {
    return parseParameters({ maxVolatility, meanReversionStrength, jumpFrequency });
  } catch (err) {
    if (err instanceof ParameterValidationError) {
      console.error(err.message);
      return null;
    }
    throw err;
  }
}

const terminalSink: PlaybackSink = {
  onPoint: (point: PricePoint) => {
    console.log(formatPoint(point));
  },
  onRegimeChange: (regime: VolatilityRegime, timestamp: number) => {
    console.log(`--- regime ${regime} from t=${timestamp.toFixed(1)}s ---`);
  },
  onOverrun: (warning: OverrunWarning) => {
    console.warn(`Warning: playback ${(warning.lagMs / 1000).toFixed(1)}s behind at point ${warning.index}`);
  },
  onComplete: () => {
    console.log("Playback complete.");
  },
  onCancelled: () => {
    console.log("Playback cancelled.");
  },
};

const program = new Command();

program
  .name("spot-sim")
  .description("Mean-reverting spot price simulation with real-time playback")
  .option("-s, --seed <value>", "RNG seed for reproducibility")
  .option("--max-volatility <number>", "Max volatility, EUR/MWh [0-50]", "15")
  .option("--mean-reversion <number>", "Mean reversion strength per second [0.01-0.5]", "0.05")
  .option("--jump-frequency <number>", "Jumps per minute [0-5]", "2")
  .option("--tick-ms <number>", "Wall-clock milliseconds per point", String(env.PLAYBACK_TICK_MS))
  .option("--no-playback", "Generate and report only")
  .option("--out-dir <path>", "Output directory for reports", "reports")
  .action(async (opts) => {
    const parameters = readParameters(opts.maxVolatility, opts.meanReversion, opts.jumpFrequency);
    if (parameters === null) {
      process.exitCode = 1;
      return;
    }

    const seed: string | undefined = opts.seed;
    const tickMs = parseInt(opts.tickMs, 10);
    if (!Number.isFinite(tickMs) || tickMs <= 0) {
      console.error(`Invalid --tick-ms: ${opts.tickMs}`);
      process.exitCode = 1;
      return;
    }

    let timeline: SimulationTimeline | null;
    let outcome: PlaybackOutcome | null = null;
    if (opts.playback !== false) {
      const session = new SimulationSession(terminalSink, { tickMs });
      const onSigint = () => session.stop();
      process.once("SIGINT", onSigint);
      console.log(`Playing 180s run (seed=${seed ?? "random"}, tick=${tickMs}ms). Ctrl+C to stop.`);
      try {
        await session.start(parameters, { seed });
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
      timeline = session.timeline();
      const { state, emittedCount } = session.snapshot();
      outcome = { state, emittedCount };
    } else {
      timeline = generateTimeline(parameters, seed);
    }
    if (timeline === null) return;

    const outDir = isAbsolute(opts.outDir) ? opts.outDir : join(process.cwd(), opts.outDir);
    await mkdir(outDir, { recursive: true });

    const jsonPath = join(outDir, "latest.json");
    const mdPath = join(outDir, "latest.md");
    const summary = summarizeTimeline(timeline);
    await writeFile(jsonPath, JSON.stringify(toJson(timeline, summary, outcome), null, 2), "utf-8");
    await writeFile(mdPath, toMarkdown(timeline, summary, outcome), "utf-8");

    console.log(`\nReport written:`);
    console.log(`  ${jsonPath}`);
    console.log(`  ${mdPath}`);
  });

// Strip standalone "--" so commander parses options correctly
const args = process.argv.slice(2).filter((x) => x !== "--");
program.parseAsync(["node", "cli", ...args]).catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
