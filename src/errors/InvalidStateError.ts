import { AppError } from "./AppError.js";

export class InvalidStateError extends AppError {
  constructor(public readonly issues: string[]) {
    super(`Invalid state: ${issues.join("; ")}`, "INVALID_STATE", { issues });
    this.name = "InvalidStateError";
  }
}
