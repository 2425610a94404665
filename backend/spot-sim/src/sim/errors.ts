/**
 * Error types surfaced by the simulator
 */

import type { ZodIssue } from "zod";

/** Parameters outside their allowed ranges; raised before any generation */
export class ParameterValidationError extends Error {
  constructor(readonly issues: ZodIssue[]) {
    super(
      `Invalid simulation parameters: ${issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`
    );
    this.name = "ParameterValidationError";
  }
}

/** A produced price left [floor, ceiling]; indicates a bug in the engine */
export class NumericInstabilityError extends Error {
  constructor(readonly index: number, readonly price: number) {
    super(`Price ${price} at tick ${index} is outside the allowed range`);
    this.name = "NumericInstabilityError";
  }
}

/** Fatal failure while generating a timeline; no partial timeline exists */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export class PlaybackStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlaybackStateError";
  }
}

export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionStateError";
  }
}
