import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { getAllTags, listQuestions } from "../db/questions.js";

export default async function handleTagsCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const tags = getAllTags(ctx.app.bank);
  if (tags.length === 0) {
    return { response: "🏷 No tags yet." };
  }
  const lines = tags.map((tag) => `${tag} (${listQuestions(ctx.app.bank, { tags: [tag] }).length})`);
  return { response: ["🏷 Tags", "", ...lines].join("\n") };
}
