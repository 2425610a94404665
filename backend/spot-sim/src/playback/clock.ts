import { performance } from "node:perf_hooks";
import { setTimeout as delay } from "node:timers/promises";

/**
 * Time source for playback pacing, in milliseconds.
 * `sleep` resolves early, without throwing, when the signal aborts.
 */
export interface PlaybackClock {
  now(): number;
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export const systemClock: PlaybackClock = {
  now: () => performance.now(),
  async sleep(ms, signal) {
    if (signal.aborted) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (signal.aborted) return;
      throw err;
    }
  },
};

/**
 * Clock whose time only moves when advanced or slept on.
 * Sleeping jumps straight to the wake-up time, so a 180s run plays in
 * microseconds while keeping every deadline exact.
 */
export class VirtualClock implements PlaybackClock {
  private current: number;

  constructor(startMs = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  /** Simulate time spent elsewhere, e.g. inside a slow consumer */
  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal: AbortSignal): Promise<void> {
    if (signal.aborted || ms <= 0) return;
    this.current += ms;
    await Promise.resolve();
  }
}
