import { describe, expect, it } from "vitest";
import {
  detectHeaders,
  importQuestionsFromCSV,
  parseCSV,
  questionsToCSV,
  rowsToQuestionInputs,
} from "../src/importExport/csv.js";
import { NOW, addQuestion, makeContext } from "./helpers/fixtures.js";

describe("parseCSV", () => {
  it("handles quoted fields, embedded commas and doubled quotes", () => {
    const rows = parseCSV('question,correct_answer\r\n"Say ""hi"", then leave",Hello, world\n');
    expect(rows).toEqual([
      ["question", "correct_answer"],
      ['Say "hi", then leave', "Hello", "world"],
    ]);
  });

  it("keeps empty fields", () => {
    expect(parseCSV("a,,c")).toEqual([["a", "", "c"]]);
  });
});

describe("detectHeaders", () => {
  it("maps common header names, preferring wrong over correct", () => {
    expect(detectHeaders(["Prompt", "Incorrect options", "Answer", "Topic", "Rationale"])).toEqual({
      question: 0,
      wrong_answers: 1,
      correct_answer: 2,
      tags: 3,
      explanation: 4,
    });
  });
});

describe("rowsToQuestionInputs", () => {
  it("builds inputs from mapped columns", () => {
    const rows = parseCSV(
      [
        "tags,question,wrong_answers,correct_answer,explanation",
        'geo;europe,Capital of France?,"Lyon|Nice",Paris,Seat of government',
      ].join("\n"),
    );
    const parsed = rowsToQuestionInputs(rows);
    expect(parsed.errors).toEqual([]);
    expect(parsed.lines).toEqual([2]);
    expect(parsed.inputs).toEqual([
      {
        kind: "multiple_choice",
        question_text: "Capital of France?",
        correct_answers: ["Paris"],
        wrong_answers: ["Lyon", "Nice"],
        tags: ["geo", "europe"],
        objective: undefined,
        explanations: { Paris: "Seat of government" },
      },
    ]);
  });

  it("falls back to positional columns without usable headers", () => {
    const parsed = rowsToQuestionInputs([["2 + 2?", "4", "3;5", "math"]], false);
    expect(parsed.mapping).toEqual({ question: 0, correct_answer: 1, wrong_answers: 2, tags: 3 });
    expect(parsed.inputs[0]).toMatchObject({ question_text: "2 + 2?", correct_answers: ["4"], wrong_answers: ["3", "5"] });
  });

  it("splits typed answers into accepted spellings", () => {
    const parsed = rowsToQuestionInputs([
      ["question", "correct_answer", "kind"],
      ["Colour of the sky?", "blue;azure", "typed"],
    ]);
    expect(parsed.inputs[0]).toMatchObject({ kind: "typed", correct_answers: ["blue", "azure"], wrong_answers: [] });
  });

  it("reports rows missing a question or answer and skips blank rows", () => {
    const parsed = rowsToQuestionInputs([
      ["question", "correct_answer"],
      ["", "orphan"],
      ["", " "],
      ["Q", "A"],
    ]);
    expect(parsed.errors).toEqual([{ row: 2, error: "question and correct_answer are required" }]);
    expect(parsed.lines).toEqual([4]);
  });
});

describe("CSV import and export", () => {
  it("imports rows, skipping duplicates and reporting invalid ones by line", () => {
    const ctx = makeContext();
    addQuestion(ctx, { question_text: "Existing", correct_answers: ["yes"], wrong_answers: ["no"] });

    const csv = [
      "question,correct_answer,wrong_answers,tags",
      "Existing,yes,no,",
      "New one,A,B;C,quiz",
      "Lonely,A,,",
    ].join("\n");
    const result = importQuestionsFromCSV(ctx, csv, NOW);

    expect(result.created.map((question) => question.question_text)).toEqual(["New one"]);
    expect(result.skipped).toBe(1);
    expect(result.errors).toEqual([
      { row: 4, error: "wrong_answers: a multiple choice question needs at least one wrong answer" },
    ]);
    expect(ctx.bank.questions).toHaveLength(2);
  });

  it("exports every field quoted under the standard header", () => {
    const ctx = makeContext();
    addQuestion(ctx, {
      question_text: 'Quote "this", please',
      correct_answers: ["ok"],
      wrong_answers: ["no", "never"],
      tags: ["b", "a"],
      objective: "quoting",
      explanations: { ok: "because" },
    });

    expect(questionsToCSV(ctx.bank.questions).split("\n")).toEqual([
      "question,correct_answer,wrong_answers,tags,objective,explanation,kind",
      '"Quote ""this"", please","ok","no;never","a;b","quoting","because","multiple_choice"',
    ]);
  });

  it("re-imports its own export", () => {
    const source = makeContext();
    addQuestion(source, { question_text: "Sky?", correct_answers: ["Blue"], wrong_answers: ["Red"], tags: ["colour"] });
    addQuestion(source, { kind: "typed", question_text: "Ocean?", correct_answers: ["Pacific", "The Pacific"], wrong_answers: [] });

    const target = makeContext();
    const result = importQuestionsFromCSV(target, questionsToCSV(source.bank.questions), NOW);

    expect(result.errors).toEqual([]);
    expect(target.bank.questions.map((question) => question.content_hash)).toEqual(
      source.bank.questions.map((question) => question.content_hash),
    );
  });

  it("escapes list separators inside answers", () => {
    const source = makeContext();
    addQuestion(source, {
      question_text: "Condiments?",
      correct_answers: ["salt; pepper"],
      wrong_answers: ["oil|vinegar", "back\\slash"],
    });
    addQuestion(source, { kind: "typed", question_text: "Pipe?", correct_answers: ["a|b", "a;b"], wrong_answers: [] });

    const csv = questionsToCSV(source.bank.questions);
    expect(csv.split("\n")[1]).toBe('"Condiments?","salt; pepper","oil\\|vinegar;back\\\\slash","","","","multiple_choice"');

    const target = makeContext();
    const result = importQuestionsFromCSV(target, csv, NOW);
    expect(result.errors).toEqual([]);
    expect(target.bank.questions.map((question) => question.answers.map((answer) => answer.text))).toEqual([
      ["salt; pepper", "oil|vinegar", "back\\slash"],
      ["a|b", "a;b"],
    ]);
  });
});
