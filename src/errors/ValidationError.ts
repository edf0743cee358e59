import type { ZodError } from "zod";
import { AppError } from "./AppError.js";

export class ValidationError extends AppError {
  constructor(public readonly issues: string[]) {
    super(issues.join("; "), "VALIDATION_ERROR", { issues });
    this.name = "ValidationError";
  }
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
