import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { InvalidStateError } from "../errors/InvalidStateError.js";
import { formatZodIssues } from "../errors/ValidationError.js";
import type { Bank, Question, ReviewLogEntry, StudySession } from "../types/quiz.js";
import type { SchedulingState } from "../lib/scheduler.js";
import { bankDocumentSchema } from "./schema.js";
import type { BankDocument } from "./schema.js";

export const DEFAULT_BANK_NAME = "My Question Bank";

export function createEmptyBank(initialRating: number, now: Date, name = DEFAULT_BANK_NAME): Bank {
  return {
    version: 1,
    name,
    created_at: now,
    revision: 0,
    user: { rating: initialRating },
    questions: [],
    reviews: [],
    sessions: [],
    active_session: null,
  };
}

const iso = (date: Date): string => date.toISOString();
const isoOrNull = (date: Date | null): string | null => (date ? date.toISOString() : null);

function serializeScheduling(state: SchedulingState): BankDocument["questions"][number]["scheduling"] {
  return {
    interval_days: state.interval_days,
    ease_factor: state.ease_factor,
    next_review: isoOrNull(state.next_review),
    times_answered: state.times_answered,
    times_correct: state.times_correct,
  };
}

function serializeQuestion(question: Question): BankDocument["questions"][number] {
  return {
    id: question.id,
    kind: question.kind,
    question_text: question.question_text,
    objective: question.objective,
    answers: question.answers.map((answer) => ({ ...answer })),
    tags: [...question.tags],
    rating: question.rating,
    scheduling: serializeScheduling(question.scheduling),
    content_hash: question.content_hash,
    created_at: iso(question.created_at),
    last_studied: isoOrNull(question.last_studied),
  };
}

function serializeSession(session: StudySession): BankDocument["sessions"][number] {
  return {
    id: session.id,
    question_ids: [...session.question_ids],
    results: { ...session.results },
    started_at: iso(session.started_at),
    ended_at: isoOrNull(session.ended_at),
  };
}

function serializeReview(entry: ReviewLogEntry): BankDocument["reviews"][number] {
  return { ...entry, answered_at: iso(entry.answered_at) };
}

export function serializeBank(bank: Bank): BankDocument {
  return {
    version: bank.version,
    name: bank.name,
    created_at: iso(bank.created_at),
    revision: bank.revision,
    user: { rating: bank.user.rating },
    questions: bank.questions.map(serializeQuestion),
    reviews: bank.reviews.map(serializeReview),
    sessions: bank.sessions.map(serializeSession),
    active_session: bank.active_session ? serializeSession(bank.active_session) : null,
  };
}

export function deserializeBank(document: unknown): Bank {
  const parsed = bankDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new InvalidStateError(formatZodIssues(parsed.error));
  }
  return parsed.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface LoadBankOptions {
  initialRating: number;
  now: Date;
  /** fail instead of starting an empty bank when the file is missing */
  mustExist?: boolean;
}

/** Reads the bank document; a missing file yields a fresh, empty bank unless `mustExist` is set. */
export async function loadBank(filePath: string, options: LoadBankOptions): Promise<Bank> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error) && !options.mustExist) {
      return createEmptyBank(options.initialRating, options.now);
    }
    throw error;
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new InvalidStateError([
      `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  return deserializeBank(document);
}

export async function saveBank(filePath: string, bank: Bank): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tempPath, `${JSON.stringify(serializeBank(bank), null, 2)}\n`, "utf8");
  await rename(tempPath, filePath);
}
