import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DuplicateQuestionError } from "../errors/DuplicateQuestionError.js";
import type { DuplicateQuestionDetails } from "../errors/DuplicateQuestionError.js";
import { QuestionNotFoundError } from "../errors/NotFoundError.js";
import { ValidationError, formatZodIssues } from "../errors/ValidationError.js";
import { makeQuestionContentHash, normalizeForHash, normalizeTags } from "../lib/text/normalize.js";
import type { ReviewScheduler } from "../lib/scheduler.js";
import type { RatingEngine } from "../lib/rating.js";
import type { Answer, Bank, Question, QuestionKind } from "../types/quiz.js";

const nonEmptyText = z.string().trim().min(1);

const createQuestionSchema = z
  .object({
    kind: z.enum(["multiple_choice", "typed"]).default("multiple_choice"),
    question_text: nonEmptyText,
    correct_answers: z.array(nonEmptyText).min(1),
    wrong_answers: z.array(nonEmptyText).default([]),
    tags: z.array(z.string()).default([]),
    objective: z.string().trim().optional(),
    explanations: z.record(z.string()).default({}),
  })
  .superRefine((input, ctx) => {
    if (input.kind === "multiple_choice") {
      if (input.correct_answers.length !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["correct_answers"],
          message: "a multiple choice question needs exactly one correct answer",
        });
      }
      if (input.wrong_answers.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["wrong_answers"],
          message: "a multiple choice question needs at least one wrong answer",
        });
      }
    } else if (input.wrong_answers.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["wrong_answers"],
        message: "a typed question takes accepted answers only",
      });
    }
  });

export type CreateQuestionInput = z.input<typeof createQuestionSchema>;

export interface UpdateQuestionData {
  question_text?: string;
  objective?: string | null;
  tags?: string[];
}

export interface QuestionDeps {
  scheduler: ReviewScheduler;
  rating: RatingEngine;
  now: Date;
}

function touch(bank: Bank): void {
  bank.revision += 1;
}

function hashQuestion(question: Pick<Question, "question_text" | "answers" | "tags">): string {
  return makeQuestionContentHash({
    question_text: question.question_text,
    correct_answers: question.answers.filter((answer) => answer.is_correct).map((answer) => answer.text),
    wrong_answers: question.answers.filter((answer) => !answer.is_correct).map((answer) => answer.text),
    tags: question.tags,
  });
}

function toDuplicateDetails(question: Question | undefined): DuplicateQuestionDetails | undefined {
  if (!question) {
    return undefined;
  }

  return {
    id: question.id,
    question_text: question.question_text,
    tags: question.tags,
  };
}

export function findQuestionByHash(bank: Bank, contentHash: string): Question | undefined {
  return bank.questions.find((question) => question.content_hash === contentHash);
}

function buildAnswer(text: string, isCorrect: boolean, explanations: Record<string, string>): Answer {
  const trimmed = text.trim();
  return {
    id: randomUUID(),
    text: trimmed,
    is_correct: isCorrect,
    explanation: explanations[trimmed] ?? null,
  };
}

export function createQuestion(bank: Bank, input: CreateQuestionInput, deps: QuestionDeps): Question {
  const parsed = createQuestionSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(formatZodIssues(parsed.error));
  }
  const data = parsed.data;

  const answers = [
    ...data.correct_answers.map((text) => buildAnswer(text, true, data.explanations)),
    ...data.wrong_answers.map((text) => buildAnswer(text, false, data.explanations)),
  ];
  const tags = normalizeTags(data.tags);
  const questionText = data.question_text;
  const contentHash = hashQuestion({ question_text: questionText, answers, tags });

  const existing = findQuestionByHash(bank, contentHash);
  if (existing) {
    throw new DuplicateQuestionError(contentHash, toDuplicateDetails(existing));
  }

  const question: Question = {
    id: randomUUID(),
    kind: data.kind,
    question_text: questionText,
    objective: data.objective ? data.objective : null,
    answers,
    tags,
    rating: deps.rating.initialRating,
    scheduling: deps.scheduler.seedState(),
    content_hash: contentHash,
    created_at: deps.now,
    last_studied: null,
  };

  bank.questions = [...bank.questions, question];
  touch(bank);
  return question;
}

export function createTrueFalseQuestion(
  bank: Bank,
  input: { statement: string; answer: boolean; tags?: string[]; objective?: string },
  deps: QuestionDeps,
): Question {
  return createQuestion(
    bank,
    {
      kind: "multiple_choice",
      question_text: input.statement,
      correct_answers: [input.answer ? "True" : "False"],
      wrong_answers: [input.answer ? "False" : "True"],
      tags: input.tags,
      objective: input.objective,
    },
    deps,
  );
}

export interface BulkAddOptions {
  skipDuplicates?: boolean;
}

export interface BulkAddResult {
  created: Question[];
  skipped: number;
  errors: { index: number; error: string }[];
}

export function bulkAddQuestions(
  bank: Bank,
  inputs: CreateQuestionInput[],
  deps: QuestionDeps,
  options: BulkAddOptions = {},
): BulkAddResult {
  const skipDuplicates = options.skipDuplicates ?? true;
  const result: BulkAddResult = { created: [], skipped: 0, errors: [] };

  inputs.forEach((input, index) => {
    try {
      result.created.push(createQuestion(bank, input, deps));
    } catch (error) {
      if (error instanceof DuplicateQuestionError && skipDuplicates) {
        result.skipped += 1;
        return;
      }
      if (error instanceof DuplicateQuestionError || error instanceof ValidationError) {
        result.errors.push({ index, error: error.message });
        return;
      }
      throw error;
    }
  });

  return result;
}

export function getQuestionById(bank: Bank, id: string): Question | null {
  return bank.questions.find((question) => question.id === id) ?? null;
}

const MIN_PREFIX_LENGTH = 4;

/** Resolves a full id or an unambiguous id prefix, as printed by the CLI. */
export function findQuestion(bank: Bank, ref: string): Question {
  const exact = getQuestionById(bank, ref);
  if (exact) {
    return exact;
  }

  if (ref.length >= MIN_PREFIX_LENGTH) {
    const matches = bank.questions.filter((question) => question.id.startsWith(ref));
    if (matches.length === 1) {
      return matches[0];
    }
  }

  throw new QuestionNotFoundError(ref);
}

export interface ListQuestionsOptions {
  tags?: string[];
  limit?: number;
  offset?: number;
}

export function listQuestions(bank: Bank, options: ListQuestionsOptions = {}): Question[] {
  const wanted = normalizeTags(options.tags);
  const offset = options.offset ?? 0;

  const filtered =
    wanted.length > 0
      ? bank.questions.filter((question) => wanted.some((tag) => question.tags.includes(tag)))
      : bank.questions;

  return options.limit !== undefined
    ? filtered.slice(offset, offset + options.limit)
    : filtered.slice(offset);
}

export function searchQuestions(bank: Bank, query: string): Question[] {
  const needle = normalizeForHash(query);
  if (!needle) {
    return [];
  }

  return bank.questions.filter((question) => {
    const haystacks = [
      question.question_text,
      question.objective ?? "",
      ...question.answers.map((answer) => answer.text),
    ];
    return haystacks.some((text) => normalizeForHash(text).includes(needle));
  });
}

export function getAllTags(bank: Bank): string[] {
  const tags = new Set<string>();
  for (const question of bank.questions) {
    for (const tag of question.tags) tags.add(tag);
  }
  return Array.from(tags).sort();
}

export function replaceQuestion(bank: Bank, question: Question): void {
  const index = bank.questions.findIndex((entry) => entry.id === question.id);
  if (index === -1) {
    throw new QuestionNotFoundError(question.id);
  }
  bank.questions = bank.questions.map((entry, i) => (i === index ? question : entry));
  touch(bank);
}

export function updateQuestion(bank: Bank, id: string, data: UpdateQuestionData): Question {
  const current = findQuestion(bank, id);

  const questionText = data.question_text !== undefined ? data.question_text.trim() : current.question_text;
  if (!questionText) {
    throw new ValidationError(["question_text: must not be empty"]);
  }

  const tags = data.tags !== undefined ? normalizeTags(data.tags) : current.tags;
  const objective =
    data.objective !== undefined ? (data.objective?.trim() ? data.objective.trim() : null) : current.objective;

  const contentHash = hashQuestion({ question_text: questionText, answers: current.answers, tags });
  const clash = findQuestionByHash(bank, contentHash);
  if (clash && clash.id !== current.id) {
    throw new DuplicateQuestionError(contentHash, toDuplicateDetails(clash));
  }

  const updated: Question = {
    ...current,
    question_text: questionText,
    objective,
    tags,
    content_hash: contentHash,
  };
  replaceQuestion(bank, updated);
  return updated;
}

export function deleteQuestion(bank: Bank, id: string): Question {
  const question = findQuestion(bank, id);
  bank.questions = bank.questions.filter((entry) => entry.id !== question.id);
  touch(bank);
  return question;
}

export function setUserRating(bank: Bank, rating: number): void {
  bank.user = { ...bank.user, rating };
  touch(bank);
}

/** Puts every question back to its unseen state and forgets all review history. */
export function resetProgress(bank: Bank, deps: Omit<QuestionDeps, "now">): void {
  bank.questions = bank.questions.map((question) => ({
    ...question,
    rating: deps.rating.initialRating,
    scheduling: deps.scheduler.seedState(),
    last_studied: null,
  }));
  bank.user = { rating: deps.rating.initialRating };
  bank.reviews = [];
  bank.sessions = [];
  bank.active_session = null;
  touch(bank);
}

export function questionKindLabel(kind: QuestionKind): string {
  return kind === "typed" ? "typed answer" : "multiple choice";
}
