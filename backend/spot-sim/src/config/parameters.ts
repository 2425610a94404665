/**
 * Simulation parameter schema. Everything downstream assumes parameters
 * that passed through here.
 */

import { z } from "zod";
import { DEFAULT_PARAMETERS, PARAMETER_BOUNDS } from "./market.js";
import { ParameterValidationError } from "../sim/errors.js";
import type { SimulationParameters } from "../models/types.js";

/** Numbers, or non-blank numeric strings from the command line */
const numeric = z.union([z.number(), z.string().trim().min(1)]);

const bounded = (bounds: { min: number; max: number }, fallback: number) =>
  numeric.pipe(z.coerce.number().finite().min(bounds.min).max(bounds.max)).default(fallback);

export const parametersSchema = z.object({
  maxVolatility: bounded(PARAMETER_BOUNDS.maxVolatility, DEFAULT_PARAMETERS.maxVolatility),
  meanReversionStrength: bounded(
    PARAMETER_BOUNDS.meanReversionStrength,
    DEFAULT_PARAMETERS.meanReversionStrength
  ),
  jumpFrequency: bounded(PARAMETER_BOUNDS.jumpFrequency, DEFAULT_PARAMETERS.jumpFrequency),
});

export type ParametersInput = z.input<typeof parametersSchema>;

/** Validate and freeze; throws ParameterValidationError on out-of-range input */
export function parseParameters(input: unknown): SimulationParameters {
  const result = parametersSchema.safeParse(input);
  if (!result.success) {
    throw new ParameterValidationError(result.error.issues);
  }
  return Object.freeze({ ...result.data });
}
