import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { getBankStats } from "../stats/bankStats.js";
import { REVIEW_RANGES, formatReviewStats, getReviewStats, isReviewRange } from "../stats/reviews.js";
import { fmtBankStats } from "../ui/format.js";
import { usage } from "./utils.js";

export default async function handleStatsCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [range] = params;
  if (range === undefined) {
    return { response: fmtBankStats(getBankStats(ctx.app, ctx.now)) };
  }

  if (!isReviewRange(range)) {
    return usage(`Usage: stats [${REVIEW_RANGES.join("|")}]`);
  }

  const stats = getReviewStats(ctx.app.bank, range, ctx.now);
  return { response: formatReviewStats({ ...stats, range }) };
}
