import path from "node:path";
import type { CommandContext, CommandResponse } from "../commandTypes.js";
import type { QuestionDeps } from "../db/questions.js";

export function usage(text: string): CommandResponse {
  return { response: `❓ ${text}`, exitCode: 1 };
}

export function questionDeps(ctx: CommandContext): QuestionDeps {
  return { scheduler: ctx.app.scheduler, rating: ctx.app.rating, now: ctx.now };
}

export function resolvePath(ctx: CommandContext, file: string): string {
  return path.resolve(ctx.cwd, file);
}

/** Splits `a | b | c` into trimmed fields; empty fields are kept so positions line up. */
export function splitFields(raw: string): string[] {
  return raw.split("|").map((field) => field.trim());
}

export function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(/[;,]/)
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Reads `key=value` options. A token without `=` continues the previous value,
 * so `text=What is this` needs no quoting.
 */
export function parseOptions(params: string[]): { options: Record<string, string>; positional: string[] } {
  const options: Record<string, string> = {};
  const positional: string[] = [];
  let lastKey: string | null = null;

  for (const param of params) {
    const eq = param.indexOf("=");
    if (eq > 0) {
      lastKey = param.slice(0, eq).toLowerCase();
      options[lastKey] = param.slice(eq + 1);
    } else if (lastKey !== null) {
      options[lastKey] = `${options[lastKey]} ${param}`;
    } else {
      positional.push(param);
    }
  }

  return { options, positional };
}

/** Pulls every `key=value` token for one key out of the params; the last value wins. */
export function takeOption(params: string[], key: string): { value: string | undefined; rest: string[] } {
  const prefix = `${key}=`;
  let value: string | undefined;
  const rest: string[] = [];
  for (const param of params) {
    if (param.toLowerCase().startsWith(prefix)) {
      value = param.slice(prefix.length);
    } else {
      rest.push(param);
    }
  }
  return { value, rest };
}

export function parsePositiveInt(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const n = Number(value);
  return n > 0 ? n : null;
}

export function splitAnswers(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(";")
    .map((item) => item.trim())
    .filter(Boolean);
}
