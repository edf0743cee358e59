import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { resetProgress } from "../db/questions.js";

export default async function handleResetCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  if (params[0] !== "--yes") {
    return {
      response:
        "⚠️ This forgets every review, session and rating. Questions are kept.\nRun: reset --yes",
      exitCode: 1,
    };
  }

  resetProgress(ctx.app.bank, { scheduler: ctx.app.scheduler, rating: ctx.app.rating });
  ctx.app.logger?.warn("[Reset] Progress reset", { questions: ctx.app.bank.questions.length });

  return { response: "♻️ Progress reset. All questions are new again.", mutated: true };
}
