import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { answerQuestion, nextQuestion } from "../session/studySession.js";
import { fmtFeedback, shortId } from "../ui/format.js";
import { takeOption, usage } from "./utils.js";

const USAGE = "Usage: answer <id> <number|text> [time=seconds]";

export default async function handleAnswerCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const { value: time, rest: args } = takeOption(params, "time");
  const [questionId, ...rest] = args;
  if (!questionId || rest.length === 0) {
    return usage(USAGE);
  }

  let responseTimeSeconds: number | undefined;
  if (time !== undefined) {
    if (!/^\d+(\.\d+)?$/.test(time)) {
      return usage(`time must be a number of seconds. ${USAGE}`);
    }
    responseTimeSeconds = Number(time);
  }

  const feedback = answerQuestion(ctx.app, {
    questionId,
    answerText: rest.join(" "),
    responseTimeSeconds,
    now: ctx.now,
  });

  const upcoming = nextQuestion(ctx.app);
  const hint = upcoming ? `Next: next (question ${shortId(upcoming.id)})` : "That was the last one. Finish with: end";

  return {
    response: [fmtFeedback(feedback), "", hint].join("\n"),
    mutated: true,
  };
}
