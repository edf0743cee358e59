import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { createTrueFalseQuestion } from "../db/questions.js";
import { shortId } from "../ui/format.js";
import { questionDeps, splitFields, splitList, usage } from "./utils.js";

const USAGE = "Usage: add-tf statement | true or false | tags | objective";

const TRUE_WORDS = new Set(["true", "t", "yes", "y"]);
const FALSE_WORDS = new Set(["false", "f", "no", "n"]);

export default async function handleAddTrueFalseCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [statement = "", truth = "", tags, objective] = splitFields(rawParams);
  const word = truth.toLowerCase();
  if (!statement || (!TRUE_WORDS.has(word) && !FALSE_WORDS.has(word))) {
    return usage(USAGE);
  }

  const question = createTrueFalseQuestion(
    ctx.app.bank,
    {
      statement,
      answer: TRUE_WORDS.has(word),
      tags: splitList(tags),
      objective: objective || undefined,
    },
    questionDeps(ctx),
  );

  return {
    response: `✅ Added [${shortId(question.id)}] ${question.question_text}`,
    mutated: true,
  };
}
