import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { endSession } from "../session/studySession.js";
import { getStreakStats } from "../stats/streaks.js";
import { fmtSessionSummary } from "../ui/format.js";

export default async function handleEndCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const summary = endSession(ctx.app, ctx.now);
  const streak = getStreakStats(ctx.app.bank, ctx.now).current_streak;

  return {
    response: [fmtSessionSummary(summary), `🔥 Current streak: ${streak} day${streak === 1 ? "" : "s"}`].join("\n"),
    mutated: true,
  };
}
