import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { createQuestion } from "../db/questions.js";
import { shortId } from "../ui/format.js";
import { questionDeps, splitAnswers, splitFields, splitList, usage } from "./utils.js";

const USAGE = "Usage: add-typed question | accepted1;accepted2 | tags | objective";

export default async function handleAddTypedCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  if (!rawParams.includes("|")) {
    return usage(USAGE);
  }

  const [questionText = "", accepted, tags, objective] = splitFields(rawParams);
  const question = createQuestion(
    ctx.app.bank,
    {
      kind: "typed",
      question_text: questionText,
      correct_answers: splitAnswers(accepted),
      tags: splitList(tags),
      objective: objective || undefined,
    },
    questionDeps(ctx),
  );

  return {
    response: `✅ Added [${shortId(question.id)}] ${question.question_text} (typed answer)`,
    mutated: true,
  };
}
