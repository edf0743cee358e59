import { AppError } from "./AppError.js";

export class SessionStateError extends AppError {
  constructor(message: string) {
    super(message, "SESSION_STATE");
    this.name = "SessionStateError";
  }
}
