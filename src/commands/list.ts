import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { listQuestions } from "../db/questions.js";
import { fmtQuestionLine } from "../ui/format.js";
import { parseOptions, parsePositiveInt } from "./utils.js";

const DEFAULT_LIMIT = 50;

export default async function handleListCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const { options, positional } = parseOptions(params);
  const tags = positional.length > 0 ? positional : undefined;
  const limit = parsePositiveInt(options.limit) ?? DEFAULT_LIMIT;
  const offset = parsePositiveInt(options.offset) ?? 0;

  const questions = listQuestions(ctx.app.bank, { tags, limit, offset });
  if (questions.length === 0) {
    return {
      response: tags
        ? `📭 No questions tagged ${tags.join(", ")}.`
        : "📭 No questions yet. Add one with: add question | correct | wrong",
    };
  }

  const total = listQuestions(ctx.app.bank, { tags }).length;
  const lines = questions.map(fmtQuestionLine);
  const header = `🗂 ${total} question${total === 1 ? "" : "s"}${tags ? ` tagged ${tags.join(", ")}` : ""}`;
  const footer = offset + questions.length < total ? [`… use offset=${offset + questions.length} for more`] : [];

  return { response: [header, "", ...lines, ...footer].join("\n") };
}
