import { z } from "zod";
import type { LevelWithSilent } from "./logger.js";
import { InvalidRequestError } from "./errors.js";

const logLevels = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

const envSchema = z.object({
  AREAS_FILE: z.string().trim().min(1).default("areas/areas.json"),
  LOG_LEVEL: z.enum(logLevels).default("info"),
});

export interface AppConfig {
  /** JSON file holding every area, keyed by slug */
  areasFile: string;
  logLevel: LevelWithSilent;
}

/**
 * Reads configuration from environment variables.
 *
 * - `AREAS_FILE` (default `areas/areas.json`)
 * - `LOG_LEVEL` (default `info`)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const names = result.error.issues.map((issue) => issue.path.join("."));
    throw new InvalidRequestError(
      `Invalid environment variable(s): ${[...new Set(names)].join(", ")}`,
    );
  }
  return {
    areasFile: result.data.AREAS_FILE,
    logLevel: result.data.LOG_LEVEL,
  };
}
