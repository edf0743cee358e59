import type { AppContext } from "./session/context.js";

export interface CommandResponse {
  response: string;
  /** non-zero marks a failed command */
  exitCode?: number;
  /** the bank changed and must be saved */
  mutated?: boolean;
}

export interface CommandContext {
  app: AppContext;
  now: Date;
  /** base directory for relative file arguments */
  cwd: string;
}

export type CommandHandler = (
  params: string[],
  rawParams: string,
  ctx: CommandContext,
) => Promise<CommandResponse>;
