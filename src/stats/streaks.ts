import { DAY_MS, toDateKey } from "../lib/dates.js";
import type { Bank } from "../types/quiz.js";

export interface StreakStats {
  current_streak: number;
  longest_streak: number;
  total_study_days: number;
  reviews_today: number;
  last_review_date: string | null;
}

function previousDayKey(key: string): string {
  return toDateKey(new Date(Date.parse(`${key}T00:00:00Z`) - DAY_MS));
}

/**
 * Streaks count consecutive UTC days with at least one review. The current
 * streak survives a day without reviews only while that day is today.
 */
export function getStreakStats(bank: Bank, now: Date): StreakStats {
  const days = new Set(bank.reviews.map((entry) => toDateKey(entry.answered_at)));
  const today = toDateKey(now);
  const reviewsToday = bank.reviews.filter((entry) => toDateKey(entry.answered_at) === today).length;

  if (days.size === 0) {
    return {
      current_streak: 0,
      longest_streak: 0,
      total_study_days: 0,
      reviews_today: 0,
      last_review_date: null,
    };
  }

  const sorted = Array.from(days).sort();
  let longest = 1;
  let run = 1;
  for (let i = 1; i < sorted.length; i++) {
    run = previousDayKey(sorted[i]) === sorted[i - 1] ? run + 1 : 1;
    longest = Math.max(longest, run);
  }

  let current = 0;
  let cursor = days.has(today) ? today : previousDayKey(today);
  while (days.has(cursor)) {
    current += 1;
    cursor = previousDayKey(cursor);
  }

  return {
    current_streak: current,
    longest_streak: longest,
    total_study_days: days.size,
    reviews_today: reviewsToday,
    last_review_date: sorted[sorted.length - 1],
  };
}
