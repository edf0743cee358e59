import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { dueQuestions } from "../session/studySession.js";
import { fmtQuestionLine } from "../ui/format.js";

const MAX_LISTED = 20;

export default async function handleDueCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const due = dueQuestions(ctx.app, ctx.now);
  if (due.length === 0) {
    return { response: "🎉 Nothing is due. Come back later!" };
  }

  const suggested = ctx.app.scheduler.suggestSessionSize(due.length);
  const lines = due.slice(0, MAX_LISTED).map(fmtQuestionLine);
  if (due.length > MAX_LISTED) {
    lines.push(`… and ${due.length - MAX_LISTED} more`);
  }

  return {
    response: [
      `⏰ ${due.length} question${due.length === 1 ? "" : "s"} due`,
      `Suggested session size: ${suggested}`,
      "",
      ...lines,
    ].join("\n"),
  };
}
