#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import { dispatchCommand, parseArgs } from "./commandParser.js";
import { loadConfig } from "./config/env.js";
import { loadBank, saveBank } from "./db/store.js";
import { isAppError } from "./errors/AppError.js";
import { createLogger, errorFields } from "./lib/logger.js";
import type { AppLogger } from "./lib/logger.js";
import { buildEngines, createAppContext } from "./session/context.js";
import { fmtHelp } from "./ui/format.js";

async function run(argv: string[], now: Date = new Date()): Promise<number> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, production: config.production });

  const parsed = parseArgs(argv);
  if (!parsed) {
    process.stdout.write(`${fmtHelp()}\n`);
    return 0;
  }

  const engines = buildEngines(config);
  const dataFile = path.resolve(config.dataFile);
  const bank = await loadBank(dataFile, { initialRating: engines.rating.initialRating, now });
  const app = createAppContext({ bank, engines, settings: config.session, logger });

  logger.debug("[CLI] Bank loaded", { file: dataFile, questions: bank.questions.length, revision: bank.revision });

  const result = await dispatchCommand(parsed, { app, now, cwd: process.cwd() });

  if (result.mutated) {
    await saveBank(dataFile, app.bank);
    logger.debug("[CLI] Bank saved", { file: dataFile, revision: app.bank.revision });
  }

  const exitCode = result.exitCode ?? 0;
  const stream = exitCode === 0 ? process.stdout : process.stderr;
  stream.write(`${result.response}\n`);
  return exitCode;
}

function reportFatal(error: unknown, logger: AppLogger): void {
  if (isAppError(error)) {
    logger.warn("[CLI] Startup failed", { code: error.code, ...errorFields(error) });
    process.stderr.write(`❌ ${error.message}\n`);
    return;
  }
  logger.error("[CLI] Unexpected failure", errorFields(error));
  process.stderr.write(`❌ ${error instanceof Error ? error.message : String(error)}\n`);
}

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    reportFatal(error, createLogger({ level: "error" }));
    process.exitCode = 1;
  },
);
