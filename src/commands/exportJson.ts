import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { saveBank } from "../db/store.js";
import { resolvePath, usage } from "./utils.js";

export default async function handleExportJsonCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [file] = params;
  if (!file) {
    return usage("Usage: export-json <file>");
  }

  const filePath = resolvePath(ctx, file);
  await saveBank(filePath, ctx.app.bank);
  return { response: `📤 Wrote the bank (${ctx.app.bank.questions.length} questions) to ${filePath}` };
}
