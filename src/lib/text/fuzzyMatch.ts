export type TypedAnswerVerdict = "exact" | "close" | "wrong";

export function normalizeAnswerText(text: string): string {
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

export function levenshtein(a: string, b: string): number {
  const matrix: number[][] = Array.from({ length: a.length + 1 }, () =>
    new Array<number>(b.length + 1).fill(0),
  );
  for (let i = 0; i <= a.length; i++) matrix[i][0] = i;
  for (let j = 0; j <= b.length; j++) matrix[0][j] = j;
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      matrix[i][j] = Math.min(
        matrix[i - 1][j] + 1,
        matrix[i][j - 1] + 1,
        matrix[i - 1][j - 1] + cost,
      );
    }
  }
  return matrix[a.length][b.length];
}

const MAX_TYPO_DISTANCE = 2;
// shorter answers must match exactly: "4" and "7" are one edit apart
const MIN_LENGTH_FOR_TYPOS = 5;

/** Grades a typed answer against every accepted spelling and keeps the best verdict. */
export function gradeTypedAnswer(userAnswer: string, accepted: string[]): TypedAnswerVerdict {
  const normalizedUser = normalizeAnswerText(userAnswer);
  if (!normalizedUser) {
    return "wrong";
  }

  let verdict: TypedAnswerVerdict = "wrong";
  for (const candidate of accepted) {
    const normalizedCandidate = normalizeAnswerText(candidate);
    if (normalizedUser === normalizedCandidate) {
      return "exact";
    }
    if (
      normalizedCandidate.length >= MIN_LENGTH_FOR_TYPOS &&
      levenshtein(normalizedUser, normalizedCandidate) <= MAX_TYPO_DISTANCE
    ) {
      verdict = "close";
    }
  }
  return verdict;
}
