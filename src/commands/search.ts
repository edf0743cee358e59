import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { searchQuestions } from "../db/questions.js";
import { fmtQuestionLine } from "../ui/format.js";
import { usage } from "./utils.js";

export default async function handleSearchCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const query = rawParams.trim();
  if (!query) {
    return usage("Usage: search <text>");
  }

  const matches = searchQuestions(ctx.app.bank, query);
  if (matches.length === 0) {
    return { response: `🔍 No questions match "${query}".` };
  }
  return {
    response: [`🔍 ${matches.length} match${matches.length === 1 ? "" : "es"}`, "", ...matches.map(fmtQuestionLine)].join(
      "\n",
    ),
  };
}
