import type { CommandContext, CommandResponse } from "./commandTypes.js";
import { commandRegistry } from "./commands/index.js";
import { isAppError } from "./errors/AppError.js";
import { errorFields } from "./lib/logger.js";

export type { CommandResponse, CommandContext } from "./commandTypes.js";

export interface ParsedCommand {
  command: string;
  params: string[];
  rawParams: string;
}

/** Whitespace-separated tokens; double quotes group words and are dropped. */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inQuotes = false;
  let hasToken = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
      hasToken = true;
    } else if (!inQuotes && /\s/.test(char)) {
      if (hasToken) {
        tokens.push(current);
        current = "";
        hasToken = false;
      }
    } else {
      current += char;
      hasToken = true;
    }
  }
  if (hasToken) {
    tokens.push(current);
  }
  return tokens;
}

export function parseCommand(message: string): ParsedCommand | null {
  return parseArgs(tokenize(message.trim()));
}

/** Builds a command from already split arguments, as the shell passes them. */
export function parseArgs(args: string[]): ParsedCommand | null {
  const [first, ...params] = args;
  if (first === undefined) {
    return null;
  }
  // a leading slash is accepted, so `/due` and `due` are the same command
  const command = first.replace(/^\//, "").toLowerCase();
  if (!command) {
    return null;
  }
  return { command, params, rawParams: params.join(" ") };
}

export async function dispatchCommand(parsed: ParsedCommand, ctx: CommandContext): Promise<CommandResponse> {
  const logger = ctx.app.logger;
  const handler = commandRegistry[parsed.command];
  if (!handler) {
    return {
      response: `❓ Unknown command: ${parsed.command}\nUse help to see what is available.`,
      exitCode: 1,
    };
  }

  logger?.debug("[CommandParser] Dispatching command", {
    command: parsed.command,
    params: parsed.params.length,
  });

  try {
    return await handler(parsed.params, parsed.rawParams, ctx);
  } catch (error) {
    if (isAppError(error)) {
      logger?.warn("[CommandParser] Command failed", { command: parsed.command, code: error.code });
      return { response: `❌ ${error.message}`, exitCode: 1 };
    }
    logger?.error("[CommandParser] Unexpected error", { command: parsed.command, ...errorFields(error) });
    return {
      response: `❌ ${error instanceof Error ? error.message : String(error)}`,
      exitCode: 1,
    };
  }
}

export async function processCommand(message: string, ctx: CommandContext): Promise<CommandResponse> {
  const parsed = parseCommand(message);
  if (!parsed) {
    return { response: "❓ Type a command, or help for the list.", exitCode: 1 };
  }
  return dispatchCommand(parsed, ctx);
}
