/**
 * Real-time playback of a precomputed timeline.
 *
 * Point i is due at anchor + (i - anchorIndex) * tick. Deadlines are absolute,
 * so a slow consumer only compresses the wait before later points; it never
 * shifts the schedule, and no point is skipped or reordered.
 *
 *   IDLE --play--> RUNNING <--pause/resume--> PAUSED
 *   RUNNING --last tick elapsed--> COMPLETED
 *   RUNNING | PAUSED --stop--> CANCELLED
 *
 * Once the last point has been handed to the sink, pause and stop are
 * ignored: a fully delivered run always ends COMPLETED.
 */

import { env } from "../config/env.js";
import { createChildLogger } from "../log/logger.js";
import type { PricePoint, SimulationTimeline, VolatilityRegime } from "../models/types.js";
import { PlaybackStateError } from "../sim/errors.js";
import type { PlaybackClock } from "./clock.js";
import { systemClock } from "./clock.js";

const log = createChildLogger({ module: "playback" });

export type PlaybackState = "IDLE" | "RUNNING" | "PAUSED" | "COMPLETED" | "CANCELLED";

export interface OverrunWarning {
  /** Index of the point whose emission tripped the warning */
  index: number;
  /** How far behind its deadline that point was emitted */
  lagMs: number;
}

export interface PlaybackSink {
  onPoint(point: PricePoint): void | Promise<void>;
  onRegimeChange?(regime: VolatilityRegime, timestamp: number): void | Promise<void>;
  onComplete?(): void | Promise<void>;
  onCancelled?(): void | Promise<void>;
  /** Non-fatal; delivery continues */
  onOverrun?(warning: OverrunWarning): void;
}

export interface PlaybackOptions {
  /** Wall-clock length of one tick */
  tickMs?: number;
  clock?: PlaybackClock;
  /** Lag that counts as being behind schedule */
  overrunThresholdMs?: number;
  /** Consecutive late points before a warning is raised */
  overrunTicks?: number;
}

export interface PlaybackSnapshot {
  state: PlaybackState;
  emittedCount: number;
  elapsedSeconds: number;
  currentPrice: number;
  regime: VolatilityRegime | null;
  /** Lag of the most recent emission */
  lagMs: number;
}

const DEFAULT_OVERRUN_TICKS = 5;

export class PlaybackController {
  private readonly tickMs: number;
  private readonly clock: PlaybackClock;
  private readonly overrunThresholdMs: number;
  private readonly overrunTicks: number;

  private status: PlaybackState = "IDLE";
  /** Next point to deliver */
  private index = 0;
  private emitted = 0;
  private lastEmitted: PricePoint | null = null;

  private anchorMs: number | null = null;
  private anchorIndex = 0;

  private stopRequested = false;
  private wake = new AbortController();
  private resumeWaiter: (() => void) | null = null;
  private run: Promise<PlaybackState> | null = null;

  private lagMs = 0;
  private lateStreak = 0;
  private overrunRaised = false;

  constructor(
    private readonly timeline: SimulationTimeline,
    private readonly sink: PlaybackSink,
    options: PlaybackOptions = {}
  ) {
    this.tickMs = options.tickMs ?? env.PLAYBACK_TICK_MS;
    this.clock = options.clock ?? systemClock;
    this.overrunThresholdMs = options.overrunThresholdMs ?? env.PLAYBACK_OVERRUN_THRESHOLD_MS;
    this.overrunTicks = options.overrunTicks ?? DEFAULT_OVERRUN_TICKS;
  }

  get state(): PlaybackState {
    return this.status;
  }

  /**
   * Start delivery. Resolves with the terminal state; rejects if a sink
   * callback throws (playback is cancelled first).
   */
  play(): Promise<PlaybackState> {
    if (this.status !== "IDLE") {
      throw new PlaybackStateError(`play() is only valid from IDLE (state: ${this.status})`);
    }
    this.status = "RUNNING";
    this.anchor(this.clock.now(), 0);
    log.info({ points: this.timeline.points.length, tickMs: this.tickMs }, "Playback started");
    this.run = this.loop();
    return this.run;
  }

  /** Terminal state once reached; resolves immediately if never played */
  done(): Promise<PlaybackState> {
    return this.run ?? Promise.resolve(this.status);
  }

  pause(): boolean {
    if (this.status !== "RUNNING" || this.stopRequested || this.allDelivered()) return false;
    this.status = "PAUSED";
    this.anchorMs = null;
    this.wake.abort();
    log.info({ index: this.index }, "Playback paused");
    return true;
  }

  resume(): boolean {
    if (this.status !== "PAUSED" || this.stopRequested) return false;
    this.status = "RUNNING";
    this.anchor(this.clock.now() + this.tickMs, this.index);
    this.releasePause();
    log.info({ index: this.index }, "Playback resumed");
    return true;
  }

  /**
   * Idempotent. A callback in flight finishes before the state becomes
   * CANCELLED. From IDLE the controller is cancelled without callbacks.
   */
  stop(): void {
    if (this.stopRequested || this.status === "COMPLETED" || this.status === "CANCELLED") return;
    if (this.status === "IDLE") {
      this.stopRequested = true;
      this.status = "CANCELLED";
      return;
    }
    if (this.allDelivered()) return;
    this.stopRequested = true;
    this.wake.abort();
    this.releasePause();
    log.info({ index: this.index }, "Playback stop requested");
  }

  snapshot(): PlaybackSnapshot {
    const last = this.lastEmitted;
    return {
      state: this.status,
      emittedCount: this.emitted,
      elapsedSeconds: this.emitted * this.timeline.tickSeconds,
      currentPrice: last?.price ?? this.timeline.initialPrice,
      regime: last?.regime ?? null,
      lagMs: this.lagMs,
    };
  }

  private async loop(): Promise<PlaybackState> {
    const points = this.timeline.points;
    try {
      while (!this.stopRequested) {
        if (this.status === "PAUSED") {
          await this.waitForResume();
          continue;
        }

        const deadline = this.deadline(this.index);
        const wait = deadline - this.clock.now();
        if (wait > 0 && (await this.sleep(wait))) continue;

        // Past the end of the last point's tick
        if (this.index >= points.length) break;

        const point = points[this.index];
        if (point === undefined) break;
        this.index++;
        this.trackLag(this.index - 1, Math.max(0, this.clock.now() - deadline));
        await this.deliver(point);
      }
    } catch (err) {
      this.status = "CANCELLED";
      log.error({ err, index: this.index }, "Playback aborted by sink error");
      await this.sink.onCancelled?.();
      throw err;
    }

    if (this.stopRequested) {
      this.status = "CANCELLED";
      log.info({ emitted: this.emitted }, "Playback cancelled");
      await this.sink.onCancelled?.();
    } else {
      this.status = "COMPLETED";
      log.info({ emitted: this.emitted }, "Playback completed");
      await this.sink.onComplete?.();
    }
    return this.status;
  }

  private async deliver(point: PricePoint): Promise<void> {
    if (this.lastEmitted === null || this.lastEmitted.regime !== point.regime) {
      await this.sink.onRegimeChange?.(point.regime, point.timestamp);
    }
    await this.sink.onPoint(point);
    this.lastEmitted = point;
    this.emitted++;
  }

  private allDelivered(): boolean {
    return this.index >= this.timeline.points.length;
  }

  private anchor(atMs: number, index: number): void {
    this.anchorMs = atMs;
    this.anchorIndex = index;
  }

  private deadline(index: number): number {
    if (this.anchorMs === null) this.anchor(this.clock.now(), index);
    return (this.anchorMs ?? 0) + (index - this.anchorIndex) * this.tickMs;
  }

  /** Returns true when woken early by pause or stop */
  private async sleep(ms: number): Promise<boolean> {
    const signal = this.wake.signal;
    await this.clock.sleep(ms, signal);
    if (!signal.aborted) return false;
    this.wake = new AbortController();
    return true;
  }

  private waitForResume(): Promise<void> {
    return new Promise((resolve) => {
      this.resumeWaiter = resolve;
    });
  }

  private releasePause(): void {
    const waiter = this.resumeWaiter;
    this.resumeWaiter = null;
    waiter?.();
  }

  private trackLag(index: number, lagMs: number): void {
    this.lagMs = lagMs;
    if (lagMs <= this.overrunThresholdMs) {
      this.lateStreak = 0;
      this.overrunRaised = false;
      return;
    }
    this.lateStreak++;
    if (this.lateStreak >= this.overrunTicks && !this.overrunRaised) {
      this.overrunRaised = true;
      const warning: OverrunWarning = { index, lagMs };
      log.warn(warning, "Playback behind schedule");
      this.sink.onOverrun?.(warning);
    }
  }
}
