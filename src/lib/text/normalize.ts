import crypto from "node:crypto";

export function normalizeForHash(value?: string | null): string {
  if (!value) {
    return "";
  }

  return value
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

function normalizeListForHash(values?: string[] | null): string {
  if (!values) {
    return "";
  }

  return values
    .map(normalizeForHash)
    .filter((entry) => entry.length > 0)
    .sort()
    .join(",");
}

export function normalizeTags(tags?: string[] | null): string[] {
  return Array.from(new Set(normalizeListForHash(tags).split(",").filter((tag) => tag.length > 0)));
}

export interface QuestionHashInput {
  question_text?: string | null;
  correct_answers?: string[] | null;
  wrong_answers?: string[] | null;
  tags?: string[] | null;
}

/**
 * Content hash used for duplicate detection. Answer order and tag order do not
 * matter; neither do case or runs of whitespace.
 */
export function makeQuestionContentHash(input: QuestionHashInput): string {
  const text = normalizeForHash(input.question_text);
  const correct = normalizeListForHash(input.correct_answers);
  const wrong = normalizeListForHash(input.wrong_answers);
  const tags = normalizeListForHash(input.tags);
  const joined = `${text}||${correct}||${wrong}||${tags}`;

  return crypto.createHash("sha256").update(joined, "utf8").digest("hex");
}
