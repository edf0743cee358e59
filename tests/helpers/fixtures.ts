import { vi } from "vitest";
import type { CommandContext } from "../../src/commandTypes.js";
import { createQuestion } from "../../src/db/questions.js";
import type { CreateQuestionInput } from "../../src/db/questions.js";
import { createEmptyBank } from "../../src/db/store.js";
import type { AppLogger } from "../../src/lib/logger.js";
import { buildEngines, createAppContext } from "../../src/session/context.js";
import type { AppContext } from "../../src/session/context.js";
import type { SessionSettings } from "../../src/config/env.js";
import type { Question } from "../../src/types/quiz.js";

export const NOW = new Date("2024-03-10T12:00:00.000Z");

export function mockLogger(): AppLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeContext(settings?: Partial<SessionSettings>): AppContext {
  const engines = buildEngines();
  return createAppContext({
    bank: createEmptyBank(engines.rating.initialRating, NOW),
    engines,
    settings,
    logger: mockLogger(),
  });
}

export function makeCommandContext(app: AppContext = makeContext(), now: Date = NOW): CommandContext {
  return { app, now, cwd: "/tmp" };
}

export function addQuestion(ctx: AppContext, input: Partial<CreateQuestionInput> & { question_text: string }): Question {
  return createQuestion(
    ctx.bank,
    {
      correct_answers: ["right"],
      wrong_answers: ["wrong"],
      ...input,
    },
    { scheduler: ctx.scheduler, rating: ctx.rating, now: NOW },
  );
}

export function correctAnswerId(question: Question): string {
  const answer = question.answers.find((entry) => entry.is_correct);
  if (!answer) throw new Error(`question ${question.id} has no correct answer`);
  return answer.id;
}

export function wrongAnswerId(question: Question): string {
  const answer = question.answers.find((entry) => !entry.is_correct);
  if (!answer) throw new Error(`question ${question.id} has no wrong answer`);
  return answer.id;
}
