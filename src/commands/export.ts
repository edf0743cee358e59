import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { listQuestions } from "../db/questions.js";
import { questionsToCSV } from "../importExport/csv.js";
import { resolvePath, usage } from "./utils.js";

export default async function handleExportCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [file, ...tags] = params;
  if (!file) {
    return usage("Usage: export <file.csv> [tag...]");
  }

  const questions = listQuestions(ctx.app.bank, { tags });
  const filePath = resolvePath(ctx, file);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${questionsToCSV(questions)}\n`, "utf8");

  return { response: `📤 Exported ${questions.length} question${questions.length === 1 ? "" : "s"} to ${filePath}` };
}
