import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { getActiveSession, nextQuestion } from "../session/studySession.js";
import { fmtQuestionPrompt } from "../ui/format.js";

export default async function handleNextCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const question = nextQuestion(ctx.app);
  const session = getActiveSession(ctx.app);
  if (!question || !session) {
    return { response: "✅ All questions in this session are done. Finish with: end" };
  }

  const done = Object.keys(session.results).length;
  return {
    response: fmtQuestionPrompt(question, { index: done + 1, total: session.question_ids.length }),
  };
}
