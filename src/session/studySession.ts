import crypto, { randomUUID } from "node:crypto";
import { AnswerNotFoundError } from "../errors/NotFoundError.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import { ValidationError } from "../errors/ValidationError.js";
import { findQuestion, replaceQuestion, setUserRating } from "../db/questions.js";
import { normalizeTags } from "../lib/text/normalize.js";
import { gradeTypedAnswer, normalizeAnswerText } from "../lib/text/fuzzyMatch.js";
import type { TypedAnswerVerdict } from "../lib/text/fuzzyMatch.js";
import type { RatingRange } from "../lib/rating.js";
import type { Answer, AttemptResult, Question, ReviewLogEntry, StudySession } from "../types/quiz.js";
import type { AppContext } from "./context.js";

export interface StartSessionOptions {
  now: Date;
  maxQuestions?: number;
  tags?: string[];
  /** "auto" centres a band on the user's rating */
  ratingRange?: RatingRange | "auto";
}

export interface StartedSession {
  session: StudySession;
  questions: Question[];
}

export interface AnswerInput {
  questionId: string;
  answerId?: string;
  /** typed answer, answer text, or 1-based position in the displayed choices */
  answerText?: string;
  responseTimeSeconds?: number;
  now: Date;
}

export interface AnswerFeedback {
  question_id: string;
  correct: boolean;
  verdict: TypedAnswerVerdict | null;
  selected_answer: string;
  correct_answer: string;
  explanation: string | null;
  user_rating: number;
  user_rating_delta: number;
  question_rating: number;
  interval_days: number;
  next_review: Date;
  /** percent of attempts answered correctly, after this one */
  accuracy: number;
}

export interface SessionSummary {
  session_id: string;
  answered: number;
  correct: number;
  incorrect: number;
  skipped: number;
  accuracy: number;
  duration_seconds: number;
}

function overdueMs(question: Question, now: Date): number {
  const nextReview = question.scheduling.next_review;
  return nextReview ? now.getTime() - nextReview.getTime() : 0;
}

/** Due questions: unseen first, then the most overdue, then the lowest ease. */
export function dueQuestions(ctx: AppContext, now: Date): Question[] {
  const due = ctx.bank.questions.filter((question) => ctx.scheduler.isDue(question.scheduling, now));

  return due.sort((a, b) => {
    const aUnseen = a.scheduling.times_answered === 0 ? 0 : 1;
    const bUnseen = b.scheduling.times_answered === 0 ? 0 : 1;
    if (aUnseen !== bUnseen) return aUnseen - bUnseen;

    const overdue = overdueMs(b, now) - overdueMs(a, now);
    if (overdue !== 0) return overdue;

    return a.scheduling.ease_factor - b.scheduling.ease_factor;
  });
}

/**
 * Orders candidates by how close the predicted success probability is to the
 * target rate. The sort is stable, so equal scores keep their due order.
 */
export function rankBySuitability(ctx: AppContext, questions: Question[]): Question[] {
  const userRating = ctx.bank.user.rating;
  const target = ctx.settings.targetSuccessRate;
  const score = (question: Question) =>
    1 - Math.abs(ctx.rating.predictSuccess(userRating, question.rating) - target);

  return questions
    .map((question) => ({ question, score: score(question) }))
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.question);
}

export function getActiveSession(ctx: AppContext): StudySession | null {
  return ctx.bank.active_session;
}

function requireActiveSession(ctx: AppContext): StudySession {
  const session = ctx.bank.active_session;
  if (!session) {
    throw new SessionStateError("No study session in progress. Start one with `study`.");
  }
  return session;
}

export function startSession(ctx: AppContext, options: StartSessionOptions): StartedSession {
  const logger = ctx.logger;
  if (ctx.bank.active_session) {
    throw new SessionStateError("A study session is already in progress. End it first.");
  }

  const maxQuestions = options.maxQuestions ?? ctx.settings.sessionSize;
  if (!Number.isInteger(maxQuestions) || maxQuestions <= 0) {
    throw new ValidationError(["maxQuestions: must be a positive integer"]);
  }

  let candidates = dueQuestions(ctx, options.now);

  const tags = normalizeTags(options.tags);
  if (tags.length > 0) {
    candidates = candidates.filter((question) => tags.some((tag) => question.tags.includes(tag)));
  }

  const range =
    options.ratingRange === "auto"
      ? ctx.rating.recommendedRatingRange(ctx.bank.user.rating, ctx.settings.ratingSpread)
      : options.ratingRange;
  if (range) {
    candidates = candidates.filter((question) => question.rating >= range.low && question.rating <= range.high);
  }

  const questions = rankBySuitability(ctx, candidates).slice(0, maxQuestions);

  const session: StudySession = {
    id: randomUUID(),
    question_ids: questions.map((question) => question.id),
    results: {},
    started_at: options.now,
    ended_at: null,
  };
  ctx.bank.active_session = session;
  ctx.bank.revision += 1;

  logger?.info("[Session] Study session started", {
    session_id: session.id,
    questions: questions.length,
    tags,
    range,
  });

  return { session, questions };
}

/** The first question of the active session that has no result yet. */
export function nextQuestion(ctx: AppContext): Question | null {
  const session = requireActiveSession(ctx);
  for (const id of session.question_ids) {
    if (session.results[id] !== undefined) continue;
    // questions deleted mid-session are passed over
    const question = ctx.bank.questions.find((entry) => entry.id === id);
    if (question) return question;
  }
  return null;
}

/** Choices in a stable, shuffled-looking order, so the correct one is not always first. */
export function displayAnswers(question: Question): Answer[] {
  const key = (answer: Answer) =>
    crypto.createHash("sha256").update(`${question.id}:${answer.id}`, "utf8").digest("hex");

  return [...question.answers].sort((a, b) => key(a).localeCompare(key(b)));
}

interface ResolvedAttempt {
  correct: boolean;
  verdict: TypedAnswerVerdict | null;
  selected: string;
  explanation: string | null;
}

function resolveChoice(question: Question, input: AnswerInput): Answer {
  if (input.answerId) {
    const ref = input.answerId;
    const byId = question.answers.find((answer) => answer.id === ref || answer.id.startsWith(ref));
    if (byId) return byId;
    throw new AnswerNotFoundError(question.id, ref);
  }

  const text = input.answerText?.trim() ?? "";
  if (/^\d+$/.test(text)) {
    const choices = displayAnswers(question);
    const choice = choices[Number(text) - 1];
    if (choice) return choice;
    throw new AnswerNotFoundError(question.id, text);
  }

  const wanted = normalizeAnswerText(text);
  const byText = question.answers.find((answer) => normalizeAnswerText(answer.text) === wanted);
  if (byText && wanted) return byText;
  throw new AnswerNotFoundError(question.id, text);
}

function resolveAttempt(question: Question, input: AnswerInput): ResolvedAttempt {
  if (question.kind === "typed") {
    const typed = input.answerText ?? "";
    const verdict = gradeTypedAnswer(
      typed,
      question.answers.filter((answer) => answer.is_correct).map((answer) => answer.text),
    );
    return {
      correct: verdict !== "wrong",
      verdict,
      selected: typed.trim(),
      explanation: question.answers.find((answer) => answer.is_correct)?.explanation ?? null,
    };
  }

  const choice = resolveChoice(question, input);
  return {
    correct: choice.is_correct,
    verdict: null,
    selected: choice.text,
    explanation: choice.explanation,
  };
}

function recordResult(ctx: AppContext, session: StudySession, questionId: string, result: AttemptResult): void {
  const questionIds = session.question_ids.includes(questionId)
    ? session.question_ids
    : [...session.question_ids, questionId];

  ctx.bank.active_session = {
    ...session,
    question_ids: questionIds,
    results: { ...session.results, [questionId]: result },
  };
}

/**
 * Scores one attempt: advances the schedule, exchanges rating points between
 * the user and the question, logs the review and records the session result.
 */
export function answerQuestion(ctx: AppContext, input: AnswerInput): AnswerFeedback {
  const logger = ctx.logger;
  const session = requireActiveSession(ctx);
  const question = findQuestion(ctx.bank, input.questionId);
  const attempt = resolveAttempt(question, input);

  const responseTime =
    input.responseTimeSeconds !== undefined && Number.isFinite(input.responseTimeSeconds)
      ? Math.max(0, input.responseTimeSeconds)
      : 0;

  const scheduling = ctx.scheduler.advance(
    question.scheduling,
    { correct: attempt.correct, response_time_seconds: responseTime },
    input.now,
  );
  const userRatingBefore = ctx.bank.user.rating;
  const ratings = ctx.rating.update(userRatingBefore, question.rating, attempt.correct);

  const updated: Question = {
    ...question,
    rating: ratings.questionRating,
    scheduling,
    last_studied: input.now,
  };
  replaceQuestion(ctx.bank, updated);
  setUserRating(ctx.bank, ratings.userRating);

  const entry: ReviewLogEntry = {
    id: randomUUID(),
    question_id: question.id,
    session_id: session.id,
    correct: attempt.correct,
    response_time_seconds: responseTime,
    answered_at: input.now,
    interval_before: question.scheduling.interval_days,
    interval_after: scheduling.interval_days,
    ease_before: question.scheduling.ease_factor,
    ease_after: scheduling.ease_factor,
    user_rating_before: userRatingBefore,
    user_rating_after: ratings.userRating,
    question_rating_before: question.rating,
    question_rating_after: ratings.questionRating,
  };
  ctx.bank.reviews = [...ctx.bank.reviews, entry];
  recordResult(ctx, session, question.id, attempt.correct ? "correct" : "incorrect");

  logger?.info("[Session] Answer recorded", {
    question_id: question.id,
    correct: attempt.correct,
    interval_days: scheduling.interval_days,
    user_rating: ratings.userRating,
  });

  const correctAnswer = question.answers.find((answer) => answer.is_correct);

  return {
    question_id: question.id,
    correct: attempt.correct,
    verdict: attempt.verdict,
    selected_answer: attempt.selected,
    correct_answer: correctAnswer?.text ?? "",
    explanation: attempt.explanation,
    user_rating: ratings.userRating,
    user_rating_delta: ratings.userRating - userRatingBefore,
    question_rating: ratings.questionRating,
    interval_days: scheduling.interval_days,
    // advance always sets next_review
    next_review: scheduling.next_review ?? input.now,
    accuracy: (scheduling.times_correct / scheduling.times_answered) * 100,
  };
}

export function skipQuestion(ctx: AppContext, questionId: string): Question {
  const session = requireActiveSession(ctx);
  const question = findQuestion(ctx.bank, questionId);
  recordResult(ctx, session, question.id, "skipped");
  ctx.bank.revision += 1;
  ctx.logger?.debug("[Session] Question skipped", { question_id: question.id });
  return question;
}

export function summarizeSession(session: StudySession, now: Date): SessionSummary {
  const results = Object.values(session.results);
  const correct = results.filter((result) => result === "correct").length;
  const incorrect = results.filter((result) => result === "incorrect").length;
  const skipped = results.filter((result) => result === "skipped").length;
  const answered = correct + incorrect;
  const end = session.ended_at ?? now;

  return {
    session_id: session.id,
    answered,
    correct,
    incorrect,
    skipped,
    accuracy: answered === 0 ? 0 : (correct / answered) * 100,
    duration_seconds: Math.max(0, Math.round((end.getTime() - session.started_at.getTime()) / 1000)),
  };
}

export function endSession(ctx: AppContext, now: Date): SessionSummary {
  const session = requireActiveSession(ctx);
  const completed: StudySession = { ...session, ended_at: now };

  ctx.bank.sessions = [...ctx.bank.sessions, completed];
  ctx.bank.active_session = null;
  ctx.bank.revision += 1;

  const summary = summarizeSession(completed, now);
  ctx.logger?.info("[Session] Study session ended", { ...summary });
  return summary;
}

/** Drops the active session without adding it to the history. */
export function abandonSession(ctx: AppContext): void {
  const session = requireActiveSession(ctx);
  ctx.bank.active_session = null;
  ctx.bank.revision += 1;
  ctx.logger?.debug("[Session] Study session abandoned", { session_id: session.id });
}
