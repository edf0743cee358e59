export { AppError, isAppError } from "./AppError.js";
export { ConfigurationError } from "./ConfigurationError.js";
export { InvalidStateError } from "./InvalidStateError.js";
export { DuplicateQuestionError } from "./DuplicateQuestionError.js";
export type { DuplicateQuestionDetails } from "./DuplicateQuestionError.js";
export { QuestionNotFoundError, AnswerNotFoundError } from "./NotFoundError.js";
export { SessionStateError } from "./SessionStateError.js";
export { ValidationError, formatZodIssues } from "./ValidationError.js";
