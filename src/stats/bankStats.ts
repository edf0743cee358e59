import { randomUUID } from "node:crypto";
import NodeCache from "node-cache";
import type { AppContext } from "../session/context.js";
import { summarizeSession } from "../session/studySession.js";
import type { Bank, Question } from "../types/quiz.js";

export interface QuestionSummary {
  id: string;
  question_text: string;
  rating: number;
  accuracy: number | null;
}

export interface BankStats {
  total_questions: number;
  answered_questions: number;
  questions_due: number;
  total_sessions: number;
  total_reviews: number;
  average_accuracy: number;
  average_ease: number | null;
  average_retention: number;
  hardest_questions: QuestionSummary[];
  easiest_questions: QuestionSummary[];
  top_tags: { tag: string; count: number }[];
  user_rating: number;
  user_level: string;
  recent_session_accuracy: number;
}

// Statistics are keyed by bank instance, revision and `now`, with 1 minute TTL
const statsCache = new NodeCache({ stdTTL: 60, useClones: false });
const bankKeys = new WeakMap<Bank, string>();

function bankKey(bank: Bank): string {
  let key = bankKeys.get(bank);
  if (key === undefined) {
    key = randomUUID();
    bankKeys.set(bank, key);
  }
  return key;
}

export function clearStatsCache(): void {
  statsCache.flushAll();
}

function accuracyOf(question: Question): number | null {
  const { times_answered, times_correct } = question.scheduling;
  return times_answered > 0 ? (times_correct / times_answered) * 100 : null;
}

function toSummary(question: Question): QuestionSummary {
  return {
    id: question.id,
    question_text: question.question_text,
    rating: question.rating,
    accuracy: accuracyOf(question),
  };
}

const average = (values: number[]): number =>
  values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;

export function getBankStats(ctx: AppContext, now: Date): BankStats {
  const { bank } = ctx;
  const cacheKey = `${bankKey(bank)}:${bank.revision}:${now.getTime()}`;
  const cached = statsCache.get<BankStats>(cacheKey);
  if (cached) {
    return cached;
  }

  const questions = bank.questions;
  const answered = questions.filter((question) => question.scheduling.times_answered > 0);
  const accuracies = answered.map((question) => accuracyOf(question) ?? 0);

  const byRating = [...questions].sort((a, b) => b.rating - a.rating);

  const tagCounts = new Map<string, number>();
  for (const question of questions) {
    for (const tag of question.tags) {
      tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
    }
  }
  const topTags = Array.from(tagCounts, ([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag))
    .slice(0, 10);

  const recentSessions = bank.sessions.slice(-10).map((session) => summarizeSession(session, now));

  const stats: BankStats = {
    total_questions: questions.length,
    answered_questions: answered.length,
    questions_due: questions.filter((question) => ctx.scheduler.isDue(question.scheduling, now)).length,
    total_sessions: bank.sessions.length,
    total_reviews: bank.reviews.length,
    average_accuracy: average(accuracies),
    average_ease: answered.length > 0 ? average(answered.map((question) => question.scheduling.ease_factor)) : null,
    average_retention: average(questions.map((question) => ctx.scheduler.retentionEstimate(question.scheduling))),
    hardest_questions: byRating.slice(0, 5).map(toSummary),
    easiest_questions: byRating.slice(-5).reverse().map(toSummary),
    top_tags: topTags,
    user_rating: bank.user.rating,
    user_level: ctx.rating.userLevel(bank.user.rating),
    recent_session_accuracy: average(recentSessions.map((summary) => summary.accuracy)),
  };

  statsCache.set(cacheKey, stats);
  return stats;
}
