import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { loadBank } from "../db/store.js";
import { clearStatsCache } from "../stats/bankStats.js";
import { resolvePath, usage } from "./utils.js";

export default async function handleImportJsonCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [file] = params;
  if (!file) {
    return usage("Usage: import-json <file> (replaces the whole bank)");
  }

  const filePath = resolvePath(ctx, file);
  const imported = await loadBank(filePath, {
    initialRating: ctx.app.rating.initialRating,
    now: ctx.now,
    mustExist: true,
  });

  ctx.app.bank = { ...imported, revision: Math.max(imported.revision, ctx.app.bank.revision) + 1 };
  clearStatsCache();
  ctx.app.logger?.info("[ImportJSON] Bank replaced", { file: filePath, questions: imported.questions.length });

  return {
    response: `📥 Loaded ${imported.questions.length} questions from ${filePath}`,
    mutated: true,
  };
}
