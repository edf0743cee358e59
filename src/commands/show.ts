import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { findQuestion } from "../db/questions.js";
import { fmtQuestionDetail } from "../ui/format.js";
import { usage } from "./utils.js";

export default async function handleShowCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [ref] = params;
  if (!ref) {
    return usage("Usage: show <id>");
  }

  const question = findQuestion(ctx.app.bank, ref);
  const difficulty = ctx.app.rating.difficultyCategory(question.rating);
  return { response: fmtQuestionDetail(question, difficulty) };
}
