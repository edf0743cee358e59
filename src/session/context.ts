import type { AppConfig, SessionSettings } from "../config/env.js";
import type { AppLogger } from "../lib/logger.js";
import { RatingEngine } from "../lib/rating.js";
import { ReviewScheduler } from "../lib/scheduler.js";
import type { Bank } from "../types/quiz.js";

export const DEFAULT_SESSION_SETTINGS: Readonly<SessionSettings> = Object.freeze({
  sessionSize: 20,
  targetSuccessRate: 0.7,
  ratingSpread: 200,
});

/**
 * Everything a command needs: the loaded bank, one scheduler and one rating
 * engine (both stateless, built once) and the session settings.
 */
export interface AppContext {
  bank: Bank;
  scheduler: ReviewScheduler;
  rating: RatingEngine;
  settings: Readonly<SessionSettings>;
  logger?: AppLogger;
}

export interface EngineSet {
  scheduler: ReviewScheduler;
  rating: RatingEngine;
}

export function buildEngines(config?: Pick<AppConfig, "scheduler" | "rating">): EngineSet {
  return {
    scheduler: new ReviewScheduler(config?.scheduler),
    rating: new RatingEngine(config?.rating),
  };
}

export function createAppContext(options: {
  bank: Bank;
  engines?: EngineSet;
  settings?: Partial<SessionSettings>;
  logger?: AppLogger;
}): AppContext {
  const engines = options.engines ?? buildEngines();
  return {
    bank: options.bank,
    scheduler: engines.scheduler,
    rating: engines.rating,
    settings: Object.freeze({ ...DEFAULT_SESSION_SETTINGS, ...options.settings }),
    logger: options.logger,
  };
}
