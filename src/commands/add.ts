import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { createQuestion } from "../db/questions.js";
import { shortId } from "../ui/format.js";
import { questionDeps, splitAnswers, splitFields, splitList, usage } from "./utils.js";

const USAGE = "Usage: add question | correct answer | wrong1;wrong2 | tags | objective";

export default async function handleAddCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  if (!rawParams.includes("|")) {
    return usage(USAGE);
  }

  const [questionText = "", correct = "", wrong, tags, objective] = splitFields(rawParams);
  const question = createQuestion(
    ctx.app.bank,
    {
      question_text: questionText,
      correct_answers: correct ? [correct] : [],
      wrong_answers: splitAnswers(wrong),
      tags: splitList(tags),
      objective: objective || undefined,
    },
    questionDeps(ctx),
  );

  ctx.app.logger?.info("[Add] Question created", { question_id: question.id, tags: question.tags });

  return {
    response: `✅ Added [${shortId(question.id)}] ${question.question_text}`,
    mutated: true,
  };
}
