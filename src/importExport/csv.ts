import { bulkAddQuestions } from "../db/questions.js";
import type { BulkAddResult, CreateQuestionInput } from "../db/questions.js";
import type { AppContext } from "../session/context.js";
import type { Question } from "../types/quiz.js";

export type CsvField =
  | "question"
  | "correct_answer"
  | "wrong_answers"
  | "tags"
  | "objective"
  | "explanation"
  | "kind";

export type HeaderMapping = Partial<Record<CsvField, number>>;

export const CSV_HEADERS: readonly CsvField[] = [
  "question",
  "correct_answer",
  "wrong_answers",
  "tags",
  "objective",
  "explanation",
  "kind",
];

// Checked in order: "incorrect" must win over "correct"
const HEADER_PATTERNS: ReadonlyArray<[CsvField, string[]]> = [
  ["wrong_answers", ["wrong", "incorrect", "distractor"]],
  ["correct_answer", ["correct", "answer", "solution"]],
  ["explanation", ["explanation", "rationale"]],
  ["objective", ["objective", "goal"]],
  ["tags", ["tags", "categories", "labels", "topic"]],
  ["kind", ["kind", "type"]],
  ["question", ["question", "prompt", "text"]],
];

const LIST_SEPARATORS = new Set([";", "|"]);

/** Splits CSV text into rows. Handles quoted fields, embedded commas and doubled quotes. */
export function parseCSV(csvData: string): string[][] {
  const lines = csvData.replace(/\r\n/g, "\n").trim().split("\n");
  const result: string[][] = [];

  for (const line of lines) {
    const fields: string[] = [];
    let currentField = "";
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (inQuotes) {
        if (char === '"' && line[i + 1] === '"') {
          currentField += '"';
          i++;
        } else if (char === '"') {
          inQuotes = false;
        } else {
          currentField += char;
        }
      } else if (char === '"' && currentField.trim() === "") {
        currentField = "";
        inQuotes = true;
      } else if (char === ",") {
        fields.push(currentField.trim());
        currentField = "";
      } else {
        currentField += char;
      }
    }

    fields.push(currentField.trim());
    result.push(fields);
  }

  return result;
}

export function detectHeaders(headerRow: string[]): HeaderMapping {
  const mapping: HeaderMapping = {};

  headerRow.forEach((cell, index) => {
    const header = cell.toLowerCase().trim();
    for (const [field, patterns] of HEADER_PATTERNS) {
      if (mapping[field] === undefined && patterns.some((pattern) => header.includes(pattern))) {
        mapping[field] = index;
        break;
      }
    }
  });

  return mapping;
}

function positionalMapping(width: number): HeaderMapping {
  const mapping: HeaderMapping = {};
  CSV_HEADERS.slice(0, width).forEach((field, index) => {
    mapping[field] = index;
  });
  return mapping;
}

/** Splits a `;` or `|` separated cell. A backslash keeps the next character literal. */
function splitList(value: string | undefined): string[] {
  if (!value) return [];
  const entries: string[] = [];
  let current = "";
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === "\\" && i + 1 < value.length) {
      current += value[i + 1];
      i++;
    } else if (LIST_SEPARATORS.has(char)) {
      entries.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  entries.push(current);
  return entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

const escapeListItem = (value: string): string => value.replace(/[\\;|]/g, (char) => `\\${char}`);

const joinList = (values: string[]): string => values.map(escapeListItem).join(";");

export interface ParsedQuestionRows {
  inputs: CreateQuestionInput[];
  /** 1-based CSV line numbers, aligned with `inputs` */
  lines: number[];
  errors: { row: number; error: string }[];
  mapping: HeaderMapping;
}

export function rowsToQuestionInputs(rows: string[][], hasHeaders = true): ParsedQuestionRows {
  const detected = hasHeaders && rows.length > 0 ? detectHeaders(rows[0]) : {};
  const hasUsableHeaders = detected.question !== undefined && detected.correct_answer !== undefined;
  const mapping = hasUsableHeaders ? detected : positionalMapping(rows[0]?.length ?? 0);
  const firstDataRow = hasHeaders ? 1 : 0;

  const parsed: ParsedQuestionRows = { inputs: [], lines: [], errors: [], mapping };
  const cell = (row: string[], field: CsvField): string | undefined => {
    const index = mapping[field];
    return index !== undefined ? row[index]?.trim() : undefined;
  };

  rows.slice(firstDataRow).forEach((row, offset) => {
    const line = offset + firstDataRow + 1;
    if (row.every((value) => !value.trim())) return;

    const questionText = cell(row, "question");
    const correct = cell(row, "correct_answer");
    if (!questionText || !correct) {
      parsed.errors.push({ row: line, error: "question and correct_answer are required" });
      return;
    }

    const kind = cell(row, "kind")?.toLowerCase() === "typed" ? "typed" : "multiple_choice";
    const correctAnswers = kind === "typed" ? splitList(correct) : [correct];
    const explanation = cell(row, "explanation");

    parsed.inputs.push({
      kind,
      question_text: questionText,
      correct_answers: correctAnswers,
      wrong_answers: kind === "typed" ? [] : splitList(cell(row, "wrong_answers")),
      tags: splitList(cell(row, "tags")),
      objective: cell(row, "objective") || undefined,
      explanations: explanation ? { [correctAnswers[0]]: explanation } : {},
    });
    parsed.lines.push(line);
  });

  return parsed;
}

const quote = (value: string): string => `"${value.replace(/"/g, '""')}"`;

/**
 * Writes one row per question in the import layout. Only the first
 * explanation on a correct answer is kept: the layout has no column for
 * explanations on wrong answers.
 */
export function questionsToCSV(questions: Question[]): string {
  const csvLines = [CSV_HEADERS.join(",")];

  for (const question of questions) {
    const correct = question.answers.filter((answer) => answer.is_correct);
    const wrong = question.answers.filter((answer) => !answer.is_correct);
    const explanation = correct.find((answer) => answer.explanation)?.explanation ?? "";

    const row = [
      question.question_text,
      // a multiple choice correct answer is read back whole, unsplit
      question.kind === "typed" ? joinList(correct.map((answer) => answer.text)) : (correct[0]?.text ?? ""),
      joinList(wrong.map((answer) => answer.text)),
      joinList(question.tags),
      question.objective ?? "",
      explanation,
      question.kind,
    ].map(quote);
    csvLines.push(row.join(","));
  }

  return csvLines.join("\n");
}

export interface CsvImportResult extends Omit<BulkAddResult, "errors"> {
  errors: { row: number; error: string }[];
  mapping: HeaderMapping;
}

export function importQuestionsFromCSV(
  ctx: AppContext,
  csvData: string,
  now: Date,
  options: { hasHeaders?: boolean; skipDuplicates?: boolean } = {},
): CsvImportResult {
  const logger = ctx.logger;
  const rows = parseCSV(csvData);
  const parsed = rowsToQuestionInputs(rows, options.hasHeaders ?? true);

  logger?.info("[ImportCSV] Parsed CSV data", {
    rows: rows.length,
    candidates: parsed.inputs.length,
    mapping: parsed.mapping,
  });

  const added = bulkAddQuestions(
    ctx.bank,
    parsed.inputs,
    { scheduler: ctx.scheduler, rating: ctx.rating, now },
    { skipDuplicates: options.skipDuplicates ?? true },
  );

  return {
    created: added.created,
    skipped: added.skipped,
    errors: [
      ...parsed.errors,
      ...added.errors.map((entry) => ({ row: parsed.lines[entry.index], error: entry.error })),
    ].sort((a, b) => a.row - b.row),
    mapping: parsed.mapping,
  };
}
