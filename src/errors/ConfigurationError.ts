import { AppError } from "./AppError.js";

/**
 * Raised while building a scheduler, a rating engine or the runtime config
 * from values that break their bounds. Not meant to be recovered from.
 */
export class ConfigurationError extends AppError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, "CONFIGURATION_ERROR", { issues });
    this.name = "ConfigurationError";
  }
}
