/**
 * One simulation run at a time: validate, generate, then play back.
 * The session object is the run context; nothing lives at module level.
 */

import { DEFAULT_INITIAL_PRICE } from "../config/market.js";
import { parseParameters } from "../config/parameters.js";
import { createChildLogger } from "../log/logger.js";
import type { SimulationParameters, SimulationTimeline } from "../models/types.js";
import type {
  PlaybackOptions,
  PlaybackSink,
  PlaybackSnapshot,
  PlaybackState,
} from "../playback/controller.js";
import { PlaybackController } from "../playback/controller.js";
import { SessionStateError } from "./errors.js";
import type { GenerateOptions } from "./timeline.js";
import { generateTimeline } from "./timeline.js";

const log = createChildLogger({ module: "session" });

export interface StartOptions extends GenerateOptions {
  seed?: number | string;
}

export interface SessionSnapshot extends PlaybackSnapshot {
  parameters: SimulationParameters | null;
  seed: number | string | null;
}

export class SimulationSession {
  private controller: PlaybackController | null = null;
  private current: SimulationTimeline | null = null;

  constructor(
    private readonly sink: PlaybackSink,
    private readonly playback: PlaybackOptions = {}
  ) {}

  /**
   * Validate parameters, generate the whole timeline, begin playback.
   * Resolves with the terminal playback state.
   */
  start(parameters: unknown, options: StartOptions = {}): Promise<PlaybackState> {
    if (this.isActive()) {
      throw new SessionStateError("A run is already in progress; stop it before starting another");
    }
    const params = parseParameters(parameters);
    const { seed, ...generateOptions } = options;
    const timeline = generateTimeline(params, seed, generateOptions);

    this.current = timeline;
    this.controller = new PlaybackController(timeline, this.sink, this.playback);
    log.info({ parameters: params, seed: seed ?? null }, "Session started");
    return this.controller.play();
  }

  pause(): boolean {
    return this.controller?.pause() ?? false;
  }

  resume(): boolean {
    return this.controller?.resume() ?? false;
  }

  stop(): void {
    this.controller?.stop();
  }

  isActive(): boolean {
    const state = this.controller?.state;
    return state === "RUNNING" || state === "PAUSED";
  }

  timeline(): SimulationTimeline | null {
    return this.current;
  }

  snapshot(): SessionSnapshot {
    const timeline = this.current;
    if (this.controller === null || timeline === null) {
      return {
        state: "IDLE",
        emittedCount: 0,
        elapsedSeconds: 0,
        currentPrice: DEFAULT_INITIAL_PRICE,
        regime: null,
        lagMs: 0,
        parameters: null,
        seed: null,
      };
    }
    return {
      ...this.controller.snapshot(),
      parameters: timeline.parameters,
      seed: timeline.seed,
    };
  }
}
