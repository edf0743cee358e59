import { z } from "zod";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import { InvalidStateError } from "../errors/InvalidStateError.js";
import { formatZodIssues } from "../errors/ValidationError.js";
import { addDays, isValidDate, toDateKey } from "./dates.js";
import { clamp, clamp01, isNonNegativeInteger } from "./numeric.js";

export interface SchedulingState {
  interval_days: number;
  ease_factor: number;
  /** null until the question is answered for the first time */
  next_review: Date | null;
  times_answered: number;
  times_correct: number;
}

export interface AttemptOutcome {
  correct: boolean;
  response_time_seconds: number;
}

export interface SchedulerConfig {
  min_ease_factor: number;
  max_ease_factor: number;
  initial_ease_factor: number;
  ease_bonus: number;
  ease_penalty: number;
  min_interval: number;
  max_interval: number;
}

export const DEFAULT_SCHEDULER_CONFIG: Readonly<SchedulerConfig> = Object.freeze({
  min_ease_factor: 1.3,
  max_ease_factor: 3.0,
  initial_ease_factor: 2.5,
  ease_bonus: 0.15,
  ease_penalty: 0.2,
  min_interval: 1.0,
  max_interval: 365.0,
});

const finite = z.number().finite();

const schedulerConfigSchema = z
  .object({
    min_ease_factor: finite.positive(),
    max_ease_factor: finite.positive(),
    initial_ease_factor: finite,
    ease_bonus: finite.nonnegative(),
    ease_penalty: finite.nonnegative(),
    min_interval: finite.positive(),
    max_interval: finite.positive(),
  })
  .superRefine((config, ctx) => {
    if (config.min_ease_factor > config.max_ease_factor) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["min_ease_factor"],
        message: "must not exceed max_ease_factor",
      });
    } else if (
      config.initial_ease_factor < config.min_ease_factor ||
      config.initial_ease_factor > config.max_ease_factor
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["initial_ease_factor"],
        message: "must lie between min_ease_factor and max_ease_factor",
      });
    }
    if (config.min_interval > config.max_interval) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["min_interval"],
        message: "must not exceed max_interval",
      });
    }
  });

function parseSchedulerConfig(overrides: Partial<SchedulerConfig>): Readonly<SchedulerConfig> {
  const merged: Record<string, unknown> = { ...DEFAULT_SCHEDULER_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = schedulerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(formatZodIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

/**
 * Checks the structural invariants of a scheduling state. Ease factors outside
 * the configured bounds are not an error here: `advance` clamps them.
 */
export function validateSchedulingState(state: SchedulingState): void {
  const issues: string[] = [];

  if (!isNonNegativeInteger(state.times_answered)) {
    issues.push("times_answered must be a non-negative integer");
  }
  if (!isNonNegativeInteger(state.times_correct)) {
    issues.push("times_correct must be a non-negative integer");
  } else if (state.times_correct > state.times_answered) {
    issues.push("times_correct must not exceed times_answered");
  }
  if (!Number.isFinite(state.interval_days) || state.interval_days < 0) {
    issues.push("interval_days must be a finite, non-negative number");
  }
  if (!Number.isFinite(state.ease_factor)) {
    issues.push("ease_factor must be finite");
  }
  if (state.next_review !== null && !isValidDate(state.next_review)) {
    issues.push("next_review must be a valid date");
  }

  if (issues.length > 0) {
    throw new InvalidStateError(issues);
  }
}

function assertValidNow(now: Date): void {
  if (!isValidDate(now)) {
    throw new InvalidStateError(["now must be a valid date"]);
  }
}

/**
 * SM-2 style review scheduler. Stateless apart from its frozen configuration:
 * every call returns a fresh state and leaves its input untouched.
 */
export class ReviewScheduler {
  readonly config: Readonly<SchedulerConfig>;

  constructor(config: Partial<SchedulerConfig> = {}) {
    this.config = parseSchedulerConfig(config);
  }

  seedState(): SchedulingState {
    return {
      interval_days: 0,
      ease_factor: this.config.initial_ease_factor,
      next_review: null,
      times_answered: 0,
      times_correct: 0,
    };
  }

  /**
   * Applies one answered attempt. The ease factor is adjusted first and the
   * adjusted value scales the interval in the same step. An interval of 0
   * marks an unseen question and grows to `min_interval` on a correct answer.
   * Response time is not part of the computation.
   */
  advance(state: SchedulingState, outcome: AttemptOutcome, now: Date): SchedulingState {
    validateSchedulingState(state);
    assertValidNow(now);

    const { min_ease_factor, max_ease_factor, min_interval, max_interval } = this.config;

    let easeFactor: number;
    let intervalDays: number;

    if (outcome.correct) {
      easeFactor = clamp(state.ease_factor + this.config.ease_bonus, min_ease_factor, max_ease_factor);
      intervalDays =
        state.interval_days === 0
          ? min_interval
          : clamp(state.interval_days * easeFactor, min_interval, max_interval);
    } else {
      easeFactor = clamp(state.ease_factor - this.config.ease_penalty, min_ease_factor, max_ease_factor);
      intervalDays = min_interval;
    }

    return {
      interval_days: intervalDays,
      ease_factor: easeFactor,
      next_review: addDays(now, intervalDays),
      times_answered: state.times_answered + 1,
      times_correct: state.times_correct + (outcome.correct ? 1 : 0),
    };
  }

  isDue(state: SchedulingState, now: Date): boolean {
    validateSchedulingState(state);
    assertValidNow(now);
    if (state.times_answered === 0 || state.next_review === null) {
      return true;
    }
    return state.next_review.getTime() <= now.getTime();
  }

  /**
   * Counts upcoming reviews per UTC calendar day, starting with the day of
   * `now`. Every day in the horizon gets an entry, including empty ones.
   */
  forecast(states: Iterable<SchedulingState>, now: Date, horizonDays: number): Map<string, number> {
    assertValidNow(now);
    const forecast = new Map<string, number>();
    const days = Number.isFinite(horizonDays) ? Math.floor(horizonDays) : 0;

    for (let i = 0; i < days; i++) {
      forecast.set(toDateKey(addDays(now, i)), 0);
    }

    for (const state of states) {
      validateSchedulingState(state);
      if (state.next_review === null) continue;
      const key = toDateKey(state.next_review);
      const count = forecast.get(key);
      if (count !== undefined) {
        forecast.set(key, count + 1);
      }
    }

    return forecast;
  }

  /** Rough recall probability from accuracy (70%) and ease (30%); 0.5 when unknown. */
  retentionEstimate(state: SchedulingState): number {
    validateSchedulingState(state);
    if (state.times_answered === 0) {
      return 0.5;
    }

    const accuracy = state.times_correct / state.times_answered;
    const { min_ease_factor, max_ease_factor } = this.config;
    const easeSpan = max_ease_factor - min_ease_factor;
    const easeContribution = easeSpan > 0 ? (state.ease_factor - min_ease_factor) / easeSpan : 0;

    return clamp01(accuracy * 0.7 + easeContribution * 0.3);
  }

  suggestSessionSize(dueCount: number, targetMinutes = 30, secondsPerQuestion = 45): number {
    if (secondsPerQuestion <= 0 || dueCount <= 0 || targetMinutes <= 0) {
      return 0;
    }
    const fits = Math.floor((targetMinutes * 60) / secondsPerQuestion);
    return Math.min(fits, Math.floor(dueCount));
  }
}
