import { DAY_MS, toDateKey } from "../lib/dates.js";
import { roundTo } from "../lib/numeric.js";
import type { Bank, ReviewLogEntry } from "../types/quiz.js";

export type ReviewRange = "today" | "7d" | "30d" | "all";

export const REVIEW_RANGES: readonly ReviewRange[] = ["today", "7d", "30d", "all"];

export interface ReviewStats {
  total: number;
  correct: number;
  wrong: number;
  avgResponseSeconds: number | null;
  byDay: { day: string; count: number }[];
  topTags: { tag: string; count: number }[];
  recent: { question_id: string; correct: boolean; answered_at: Date }[];
}

export function isReviewRange(value: string): value is ReviewRange {
  return REVIEW_RANGES.some((range) => range === value);
}

function inRange(range: ReviewRange, now: Date): (entry: ReviewLogEntry) => boolean {
  switch (range) {
    case "today": {
      const today = toDateKey(now);
      return (entry) => toDateKey(entry.answered_at) === today;
    }
    case "7d":
      return (entry) => entry.answered_at.getTime() >= now.getTime() - 7 * DAY_MS;
    case "30d":
      return (entry) => entry.answered_at.getTime() >= now.getTime() - 30 * DAY_MS;
    default:
      return () => true;
  }
}

export function getReviewStats(bank: Bank, range: ReviewRange, now: Date): ReviewStats {
  const reviews = bank.reviews.filter(inRange(range, now));
  const correct = reviews.filter((entry) => entry.correct).length;

  const totalResponse = reviews.reduce((sum, entry) => sum + entry.response_time_seconds, 0);

  const perDay = new Map<string, number>();
  for (const entry of reviews) {
    const day = toDateKey(entry.answered_at);
    perDay.set(day, (perDay.get(day) ?? 0) + 1);
  }
  const byDay = Array.from(perDay, ([day, count]) => ({ day, count }))
    .sort((a, b) => b.day.localeCompare(a.day))
    .slice(0, 7);

  const tagsById = new Map(bank.questions.map((question) => [question.id, question.tags]));
  const perTag = new Map<string, number>();
  for (const entry of reviews) {
    const tags = tagsById.get(entry.question_id);
    const primary = tags && tags.length > 0 ? tags[0] : "—";
    perTag.set(primary, (perTag.get(primary) ?? 0) + 1);
  }
  const topTags = Array.from(perTag, ([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag))
    .slice(0, 5);

  const recent = [...reviews]
    .sort((a, b) => b.answered_at.getTime() - a.answered_at.getTime())
    .slice(0, 5)
    .map((entry) => ({
      question_id: entry.question_id,
      correct: entry.correct,
      answered_at: entry.answered_at,
    }));

  return {
    total: reviews.length,
    correct,
    wrong: reviews.length - correct,
    avgResponseSeconds: reviews.length > 0 ? roundTo(totalResponse / reviews.length, 1) : null,
    byDay,
    topTags,
    recent,
  };
}

function dayBar(count: number, max: number): string {
  if (max <= 0) return "";
  const width = Math.round((count / max) * 10);
  return "█".repeat(width);
}

const RANGE_LABEL: Record<ReviewRange, string> = {
  today: "today",
  "7d": "7 days",
  "30d": "30 days",
  all: "all time",
};

export function formatReviewStats(dto: ReviewStats & { range: ReviewRange }): string {
  const lines: string[] = [];
  lines.push(`Review log (${RANGE_LABEL[dto.range]})`);
  lines.push("");
  lines.push(`Total: ${dto.total}`);
  lines.push(`Correct: ${dto.correct}   Wrong: ${dto.wrong}`);
  lines.push(`Avg response: ${dto.avgResponseSeconds !== null ? `${dto.avgResponseSeconds}s` : "n/a"}`);

  if (dto.total > 0) {
    lines.push("");
    lines.push("By day:");
    const max = Math.max(...dto.byDay.map((d) => d.count), 0);
    for (const d of dto.byDay) {
      lines.push(`${d.day} ${dayBar(d.count, max)} ${d.count}`);
    }

    lines.push("");
    lines.push("Top tags:");
    for (const t of dto.topTags) {
      lines.push(`- ${t.tag}: ${t.count}`);
    }
  }

  return lines.join("\n");
}
