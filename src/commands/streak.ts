import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { getStreakStats } from "../stats/streaks.js";
import { fmtStreak } from "../ui/format.js";

export default async function handleStreakCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  return { response: fmtStreak(getStreakStats(ctx.app.bank, ctx.now)) };
}
