import type { CommandContext, CommandResponse } from "../commandTypes.js";
import type { RatingRange } from "../lib/rating.js";
import { abandonSession, startSession } from "../session/studySession.js";
import { fmtQuestionPrompt } from "../ui/format.js";
import { parseOptions, parsePositiveInt, splitList, usage } from "./utils.js";

const USAGE = "Usage: study [max] [tag=a,b] [range=auto|1100-1300]";

function parseRange(value: string | undefined): RatingRange | "auto" | undefined | null {
  if (value === undefined) return undefined;
  if (value.toLowerCase() === "auto") return "auto";
  const match = /^(\d+(?:\.\d+)?)-(\d+(?:\.\d+)?)$/.exec(value.trim());
  if (!match) return null;
  const low = Number(match[1]);
  const high = Number(match[2]);
  return low <= high ? { low, high } : null;
}

export default async function handleStudyCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const { options, positional } = parseOptions(params);

  let maxQuestions: number | undefined;
  if (positional[0] !== undefined) {
    const parsed = parsePositiveInt(positional[0]);
    if (parsed === null) return usage(USAGE);
    maxQuestions = parsed;
  }

  const ratingRange = parseRange(options.range);
  if (ratingRange === null) {
    return usage(USAGE);
  }

  const { questions } = startSession(ctx.app, {
    now: ctx.now,
    maxQuestions,
    tags: splitList(options.tag ?? options.tags),
    ratingRange,
  });

  if (questions.length === 0) {
    abandonSession(ctx.app);
    return { response: "🎉 No questions match right now. Nothing to study!" };
  }

  const [first] = questions;
  return {
    response: [
      `🎯 Study session started: ${questions.length} question${questions.length === 1 ? "" : "s"}`,
      "",
      fmtQuestionPrompt(first, { index: 1, total: questions.length }),
    ].join("\n"),
    mutated: true,
  };
}
