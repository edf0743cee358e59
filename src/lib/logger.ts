import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type LogLevel = LevelWithSilent;

type LogArgs = Record<string, unknown>;

export interface AppLogger {
  debug(message: string, args?: LogArgs): void;
  info(message: string, args?: LogArgs): void;
  warn(message: string, args?: LogArgs): void;
  error(message: string, args?: LogArgs): void;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** JSON lines with string level labels and ISO timestamps */
  production?: boolean;
}

class PinoAppLogger implements AppLogger {
  protected logger: Logger;

  constructor(options: LoggerOptions = {}) {
    const destination = pino.destination(2);

    this.logger = options.production
      ? pino(
          {
            name: options.name || "quizdeck",
            level: options.level || "info",
            base: {},
            formatters: {
              level: (label: string, _number: number) => ({
                level: label,
              }),
            },
            timestamp: () => `,"time":"${new Date(Date.now()).toISOString()}"`,
          },
          destination,
        )
      : pino(
          {
            name: options.name || "quizdeck",
            level: options.level || "info",
            base: {},
          },
          destination,
        );
  }

  debug(message: string, args: LogArgs = {}): void {
    this.logger.debug(args, message);
  }

  info(message: string, args: LogArgs = {}): void {
    this.logger.info(args, message);
  }

  warn(message: string, args: LogArgs = {}): void {
    this.logger.warn(args, message);
  }

  error(message: string, args: LogArgs = {}): void {
    this.logger.error(args, message);
  }
}

export function createLogger(options: LoggerOptions = {}): AppLogger {
  return new PinoAppLogger(options);
}

export function errorFields(error: unknown): LogArgs {
  if (error instanceof Error) {
    return { error: error.message, name: error.name };
  }
  return { error: String(error) };
}
