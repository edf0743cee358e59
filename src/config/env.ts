import { z } from "zod";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import { formatZodIssues } from "../errors/ValidationError.js";
import type { SchedulerConfig } from "../lib/scheduler.js";
import type { RatingConfig } from "../lib/rating.js";
import type { LogLevel } from "../lib/logger.js";

export interface SessionSettings {
  sessionSize: number;
  targetSuccessRate: number;
  ratingSpread: number;
}

export interface AppConfig {
  dataFile: string;
  logLevel: LogLevel;
  production: boolean;
  scheduler: Partial<SchedulerConfig>;
  rating: Partial<RatingConfig>;
  session: SessionSettings;
}

const optionalNumber = z.coerce.number().finite().optional();

const envSchema = z.object({
  QUIZDECK_DATA_FILE: z.string().min(1).default("./data/quizdeck.json"),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])),
  NODE_ENV: z.string().default("development"),
  QUIZDECK_K_FACTOR: optionalNumber,
  QUIZDECK_INITIAL_RATING: optionalNumber,
  QUIZDECK_MIN_EASE: optionalNumber,
  QUIZDECK_MAX_EASE: optionalNumber,
  QUIZDECK_INITIAL_EASE: optionalNumber,
  QUIZDECK_EASE_BONUS: optionalNumber,
  QUIZDECK_EASE_PENALTY: optionalNumber,
  QUIZDECK_MIN_INTERVAL: optionalNumber,
  QUIZDECK_MAX_INTERVAL: optionalNumber,
  QUIZDECK_SESSION_SIZE: z.coerce.number().int().positive().default(20),
  QUIZDECK_TARGET_SUCCESS: z.coerce.number().gt(0).lt(1).default(0.7),
  QUIZDECK_RATING_SPREAD: z.coerce.number().finite().nonnegative().default(200),
});

function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Reads runtime settings from the environment. Engine bounds are only
 * collected here; the scheduler and rating engine validate them when built.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigurationError(formatZodIssues(parsed.error));
  }
  const vars = parsed.data;

  return {
    dataFile: vars.QUIZDECK_DATA_FILE,
    logLevel: vars.LOG_LEVEL,
    production: vars.NODE_ENV === "production",
    scheduler: {
      min_ease_factor: vars.QUIZDECK_MIN_EASE,
      max_ease_factor: vars.QUIZDECK_MAX_EASE,
      initial_ease_factor: vars.QUIZDECK_INITIAL_EASE,
      ease_bonus: vars.QUIZDECK_EASE_BONUS,
      ease_penalty: vars.QUIZDECK_EASE_PENALTY,
      min_interval: vars.QUIZDECK_MIN_INTERVAL,
      max_interval: vars.QUIZDECK_MAX_INTERVAL,
    },
    rating: {
      k_factor: vars.QUIZDECK_K_FACTOR,
      initial_rating: vars.QUIZDECK_INITIAL_RATING,
    },
    session: {
      sessionSize: vars.QUIZDECK_SESSION_SIZE,
      targetSuccessRate: vars.QUIZDECK_TARGET_SUCCESS,
      ratingSpread: vars.QUIZDECK_RATING_SPREAD,
    },
  };
}
