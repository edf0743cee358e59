import { z } from "zod";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import { formatZodIssues } from "../errors/ValidationError.js";

export interface RatingConfig {
  k_factor: number;
  initial_rating: number;
}

export interface RatingUpdate {
  userRating: number;
  questionRating: number;
}

export interface RatingRange {
  low: number;
  high: number;
}

export const DEFAULT_RATING_CONFIG: Readonly<RatingConfig> = Object.freeze({
  k_factor: 32,
  initial_rating: 1200,
});

export const DEFAULT_RATING_SPREAD = 200;

const ratingConfigSchema = z.object({
  k_factor: z.number().finite().positive(),
  initial_rating: z.number().finite(),
});

const DIFFICULTY_BANDS: ReadonlyArray<[number, string]> = [
  [1000, "Very Easy"],
  [1200, "Easy"],
  [1400, "Medium"],
  [1600, "Hard"],
  [1800, "Very Hard"],
];

const LEVEL_BANDS: ReadonlyArray<[number, string]> = [
  [1000, "Beginner"],
  [1200, "Novice"],
  [1400, "Intermediate"],
  [1600, "Advanced"],
  [1800, "Expert"],
];

function bandLabel(rating: number, bands: ReadonlyArray<[number, string]>, top: string): string {
  for (const [upper, label] of bands) {
    if (rating < upper) return label;
  }
  return top;
}

/**
 * ELO ratings for the user and the questions. Each answered question is a
 * match: the user wins on a correct answer and the question wins otherwise.
 * Both sides use the same K-factor, so every match is zero-sum.
 */
export class RatingEngine {
  readonly config: Readonly<RatingConfig>;

  constructor(config: Partial<RatingConfig> = {}) {
    const merged: Record<string, unknown> = { ...DEFAULT_RATING_CONFIG };
    for (const [key, value] of Object.entries(config)) {
      if (value !== undefined) merged[key] = value;
    }

    const parsed = ratingConfigSchema.safeParse(merged);
    if (!parsed.success) {
      throw new ConfigurationError(formatZodIssues(parsed.error));
    }
    this.config = Object.freeze(parsed.data);
  }

  get initialRating(): number {
    return this.config.initial_rating;
  }

  expectedScore(ratingA: number, ratingB: number): number {
    return 1 / (1 + Math.pow(10, (ratingB - ratingA) / 400));
  }

  update(userRating: number, questionRating: number, correct: boolean): RatingUpdate {
    const expectedUser = this.expectedScore(userRating, questionRating);
    const actualUser = correct ? 1 : 0;
    const k = this.config.k_factor;

    return {
      userRating: userRating + k * (actualUser - expectedUser),
      questionRating: questionRating + k * (1 - actualUser - (1 - expectedUser)),
    };
  }

  recommendedRatingRange(userRating: number, spread: number = DEFAULT_RATING_SPREAD): RatingRange {
    const width = Math.abs(spread);
    return { low: userRating - width, high: userRating + width };
  }

  predictSuccess(userRating: number, questionRating: number): number {
    return this.expectedScore(userRating, questionRating);
  }

  difficultyCategory(rating: number): string {
    return bandLabel(rating, DIFFICULTY_BANDS, "Expert");
  }

  userLevel(rating: number): string {
    return bandLabel(rating, LEVEL_BANDS, "Master");
  }
}
