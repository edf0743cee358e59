import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { nextQuestion, skipQuestion } from "../session/studySession.js";
import { shortId } from "../ui/format.js";

export default async function handleSkipCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const ref = params[0] ?? nextQuestion(ctx.app)?.id;
  if (!ref) {
    return { response: "Nothing left to skip. Finish with: end" };
  }

  const skipped = skipQuestion(ctx.app, ref);
  return {
    response: `⏭ Skipped [${shortId(skipped.id)}]`,
    mutated: true,
  };
}
