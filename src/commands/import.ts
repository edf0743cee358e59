import { readFile } from "node:fs/promises";
import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { importQuestionsFromCSV } from "../importExport/csv.js";
import { resolvePath, usage } from "./utils.js";

const MAX_LISTED_ERRORS = 10;

export default async function handleImportCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  const [file, ...flags] = params;
  if (!file) {
    return usage("Usage: import <file.csv> [--no-headers] [--keep-duplicates]");
  }

  const filePath = resolvePath(ctx, file);
  const csv = await readFile(filePath, "utf8");
  const result = importQuestionsFromCSV(ctx.app, csv, ctx.now, {
    hasHeaders: !flags.includes("--no-headers"),
    skipDuplicates: !flags.includes("--keep-duplicates"),
  });

  ctx.app.logger?.info("[ImportCSV] Import finished", {
    file: filePath,
    created: result.created.length,
    skipped: result.skipped,
    errors: result.errors.length,
  });

  const lines = [
    `📥 Imported ${result.created.length} question${result.created.length === 1 ? "" : "s"}`,
    `Skipped duplicates: ${result.skipped}`,
  ];
  if (result.errors.length > 0) {
    lines.push(`Errors: ${result.errors.length}`);
    for (const entry of result.errors.slice(0, MAX_LISTED_ERRORS)) {
      lines.push(`  row ${entry.row}: ${entry.error}`);
    }
  }

  return {
    response: lines.join("\n"),
    exitCode: result.errors.length > 0 && result.created.length === 0 ? 1 : 0,
    mutated: result.created.length > 0,
  };
}
