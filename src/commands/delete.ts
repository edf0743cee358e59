import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { deleteQuestion } from "../db/questions.js";
import { shortId } from "../ui/format.js";
import { usage } from "./utils.js";

export default async function handleDeleteCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [ref] = params;
  if (!ref) {
    return usage("Please specify the question id to delete: delete <id>\nUse list to see ids.");
  }

  const removed = deleteQuestion(ctx.app.bank, ref);
  return {
    response: `🗑 Deleted [${shortId(removed.id)}] ${removed.question_text}`,
    mutated: true,
  };
}
