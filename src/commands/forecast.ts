import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { fmtForecast } from "../ui/format.js";
import { usage } from "./utils.js";

const DEFAULT_DAYS = 7;
const MAX_DAYS = 365;

export default async function handleForecastCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const days = params[0] === undefined ? DEFAULT_DAYS : Number(params[0]);
  if (!Number.isInteger(days) || days <= 0 || days > MAX_DAYS) {
    return usage(`Usage: forecast [days], with days between 1 and ${MAX_DAYS}`);
  }

  const states = ctx.app.bank.questions.map((question) => question.scheduling);
  return { response: fmtForecast(ctx.app.scheduler.forecast(states, ctx.now, days)) };
}
