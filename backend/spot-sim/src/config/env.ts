import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  /** Wall-clock length of one playback tick */
  PLAYBACK_TICK_MS: z.coerce.number().int().positive().default(200),
  /** Lag behind schedule that counts as an overrun */
  PLAYBACK_OVERRUN_THRESHOLD_MS: z.coerce.number().int().positive().default(3000),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    throw new Error(`Invalid environment variables: ${JSON.stringify(result.error.format())}`);
  }
  return result.data;
}

export const env = loadEnv();
