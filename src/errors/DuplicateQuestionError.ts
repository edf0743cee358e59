import { AppError } from "./AppError.js";

export interface DuplicateQuestionDetails {
  id: string;
  question_text: string;
  tags: string[];
}

export class DuplicateQuestionError extends AppError {
  constructor(
    public readonly contentHash: string,
    public readonly existingQuestion?: DuplicateQuestionDetails,
  ) {
    super(
      existingQuestion ? `Duplicate of question ${existingQuestion.id}` : "Duplicate question",
      "DUPLICATE_QUESTION",
      { contentHash },
    );
    this.name = "DuplicateQuestionError";
  }
}
