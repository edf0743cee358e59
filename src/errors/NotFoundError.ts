import { AppError } from "./AppError.js";

export class QuestionNotFoundError extends AppError {
  constructor(public readonly questionId: string) {
    super(`Question ${questionId} not found`, "QUESTION_NOT_FOUND", { questionId });
    this.name = "QuestionNotFoundError";
  }
}

export class AnswerNotFoundError extends AppError {
  constructor(
    public readonly questionId: string,
    public readonly answerRef: string,
  ) {
    super(`Answer ${answerRef} not found for question ${questionId}`, "ANSWER_NOT_FOUND", {
      questionId,
      answerRef,
    });
    this.name = "AnswerNotFoundError";
  }
}
