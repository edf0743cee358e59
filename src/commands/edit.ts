import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { updateQuestion } from "../db/questions.js";
import type { UpdateQuestionData } from "../db/questions.js";
import { shortId } from "../ui/format.js";
import { parseOptions, splitList, usage } from "./utils.js";

const USAGE = "Usage: edit <id> text=... objective=... tags=a,b";

export default async function handleEditCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [ref, ...rest] = params;
  if (!ref) {
    return usage(USAGE);
  }

  const { options } = parseOptions(rest);
  const patch: UpdateQuestionData = {};
  const text = options.text ?? options.question;
  if (text !== undefined) patch.question_text = text;
  if (options.objective !== undefined) patch.objective = options.objective || null;
  if (options.tags !== undefined) patch.tags = splitList(options.tags);

  if (Object.keys(patch).length === 0) {
    return usage(USAGE);
  }

  const updated = updateQuestion(ctx.app.bank, ref, patch);
  ctx.app.logger?.info("[Edit] Question updated", { question_id: updated.id, fields: Object.keys(patch) });

  return {
    response: `✏️ Updated [${shortId(updated.id)}] ${updated.question_text}`,
    mutated: true,
  };
}
