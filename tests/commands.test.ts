import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { processCommand } from "../src/commandParser.js";
import type { CommandContext } from "../src/commandTypes.js";
import { displayAnswers } from "../src/session/studySession.js";
import { NOW, addQuestion, makeCommandContext, makeContext } from "./helpers/fixtures.js";

let dir: string;
let ctx: CommandContext;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "quizdeck-cmd-"));
  ctx = { ...makeCommandContext(), cwd: dir };
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const run = (line: string) => processCommand(line, ctx);

describe("question commands", () => {
  it("adds, lists, shows, edits and deletes questions", async () => {
    const added = await run("add Capital of France? | Paris | Lyon;Nice | geo,europe | capitals");
    expect(added.mutated).toBe(true);
    const question = ctx.app.bank.questions[0];
    expect(added.response).toBe(`✅ Added [${question.id.slice(0, 8)}] Capital of France?`);
    expect(question.tags).toEqual(["europe", "geo"]);
    expect(question.objective).toBe("capitals");

    const list = await run("list geo");
    expect(list.response.split("\n")[0]).toBe("🗂 1 question tagged geo");

    const shown = await run(`show ${question.id.slice(0, 8)}`);
    expect(shown.response).toContain("Rating: 1200 (Medium)");
    expect(shown.response).toContain("  ✔ Paris");

    const edited = await run(`edit ${question.id} text=Capital city of France? tags=geo`);
    expect(edited.mutated).toBe(true);
    expect(ctx.app.bank.questions[0].question_text).toBe("Capital city of France?");
    expect(ctx.app.bank.questions[0].tags).toEqual(["geo"]);

    const deleted = await run(`delete ${question.id}`);
    expect(deleted.response).toBe(`🗑 Deleted [${question.id.slice(0, 8)}] Capital city of France?`);
    expect(ctx.app.bank.questions).toEqual([]);
  });

  it("adds true/false and typed questions", async () => {
    await run("add-tf The sun is a star | true | space");
    await run("add-typed Capital of Japan? | Tokyo;Tokio | geo");
    const [tf, typed] = ctx.app.bank.questions;
    expect(tf.answers.find((answer) => answer.is_correct)?.text).toBe("True");
    expect(typed.kind).toBe("typed");
    expect(typed.answers.map((answer) => answer.text)).toEqual(["Tokyo", "Tokio"]);
  });

  it("reports usage and validation problems without mutating", async () => {
    const missing = await run("add just a question");
    expect(missing.exitCode).toBe(1);
    expect(missing.mutated).toBeUndefined();

    const invalid = await run("add Question? | answer");
    expect(invalid).toEqual({
      response: "❌ wrong_answers: a multiple choice question needs at least one wrong answer",
      exitCode: 1,
    });

    expect((await run("add-tf Sky is green | maybe")).exitCode).toBe(1);
    expect((await run("show deadbeef")).response).toBe("❌ Question deadbeef not found");
  });

  it("searches and lists tags", async () => {
    addQuestion(ctx.app, { question_text: "Capital of Peru?", correct_answers: ["Lima"], tags: ["geo"] });
    addQuestion(ctx.app, { question_text: "Speed of light?", correct_answers: ["c"], tags: ["physics", "geo"] });

    expect((await run("search lima")).response.split("\n")[0]).toBe("🔍 1 match");
    expect((await run("tags")).response).toBe(["🏷 Tags", "", "geo (2)", "physics (1)"].join("\n"));
  });
});

describe("study commands", () => {
  it("runs a full session from the command line", async () => {
    const first = addQuestion(ctx.app, { question_text: "2 + 2?", correct_answers: ["4"], wrong_answers: ["5"] });
    const second = addQuestion(ctx.app, { question_text: "3 + 3?", correct_answers: ["6"], wrong_answers: ["7"] });

    const started = await run("study");
    expect(started.mutated).toBe(true);
    expect(started.response.split("\n")[0]).toBe("🎯 Study session started: 2 questions");

    const choice = displayAnswers(first).findIndex((answer) => answer.is_correct) + 1;
    const answered = await run(`answer ${first.id.slice(0, 8)} ${choice} time=12`);
    expect(answered.response.split("\n")[0]).toBe("✅ Correct!");
    expect(ctx.app.bank.reviews[0].response_time_seconds).toBe(12);

    const next = await run("next");
    expect(next.response.split("\n")[0]).toBe(`Question 2/2  [${second.id.slice(0, 8)}]`);

    expect((await run("skip")).response).toBe(`⏭ Skipped [${second.id.slice(0, 8)}]`);

    const ended = await run("end");
    expect(ended.response.split("\n")).toEqual([
      "🏁 Session complete",
      "Answered: 1  Correct: 1  Incorrect: 0  Skipped: 1",
      "Accuracy: 100%",
      "Duration: 0m 0s",
      "🔥 Current streak: 1 day",
    ]);
    expect(ctx.app.bank.sessions).toHaveLength(1);
  });

  it("does not leave an empty session behind", async () => {
    const res = await run("study");
    expect(res.response).toBe("🎉 No questions match right now. Nothing to study!");
    expect(ctx.app.bank.active_session).toBeNull();
  });

  it("validates study options", async () => {
    expect((await run("study zero")).exitCode).toBe(1);
    expect((await run("study range=1300-1100")).exitCode).toBe(1);
  });

  it("answers typed questions with multi-word text", async () => {
    const question = addQuestion(ctx.app, {
      kind: "typed",
      question_text: "Largest city in the USA?",
      correct_answers: ["New York"],
      wrong_answers: [],
    });
    await run("study");
    const res = await run(`answer ${question.id} "new yrok"`);
    expect(res.response.split("\n")[0]).toBe("💡 Close! Just a small typo.");
  });

  it("grades a typed answer that ends in a number as written", async () => {
    const question = addQuestion(ctx.app, {
      kind: "typed",
      question_text: "First crewed Moon landing mission?",
      correct_answers: ["Apollo 11"],
      wrong_answers: [],
    });
    await run("study");
    const res = await run(`answer ${question.id} Apollo 11`);
    expect(res.response.split("\n")[0]).toBe("✅ Correct!");
    expect(ctx.app.bank.reviews[0].correct).toBe(true);
    expect(ctx.app.bank.reviews[0].response_time_seconds).toBe(0);

    const scheduling = ctx.app.bank.questions[0].scheduling;
    expect(scheduling.ease_factor).toBeCloseTo(2.65, 10);
    expect(scheduling.interval_days).toBe(1);
  });

  it("rejects a response time that is not a number", async () => {
    const question = addQuestion(ctx.app, { question_text: "2 + 2?", correct_answers: ["4"], wrong_answers: ["5"] });
    await run("study");
    const res = await run(`answer ${question.id} 1 time=soon`);
    expect(res.exitCode).toBe(1);
    expect(ctx.app.bank.reviews).toEqual([]);
  });

  it("reports errors when no session is active", async () => {
    expect(await run("end")).toEqual({
      response: "❌ No study session in progress. Start one with `study`.",
      exitCode: 1,
    });
  });

  it("lists due questions and the forecast", async () => {
    addQuestion(ctx.app, { question_text: "due one" });
    const due = await run("due");
    expect(due.response.split("\n").slice(0, 2)).toEqual(["⏰ 1 question due", "Suggested session size: 1"]);

    const forecast = await run("forecast 3");
    expect(forecast.response.split("\n")).toHaveLength(4);
    expect((await run("forecast 0")).exitCode).toBe(1);
  });
});

describe("stats commands", () => {
  it("shows review stats per range and the streak", async () => {
    expect((await run("stats today")).response.split("\n")[0]).toBe("Review log (today)");
    expect((await run("stats week")).exitCode).toBe(1);
    expect((await run("stats")).response.split("\n")[0]).toBe("📊 Question bank statistics");
    expect((await run("streak")).response.split("\n")[1]).toBe("Current streak: 0 days");
  });
});

describe("data commands", () => {
  it("exports and imports CSV files", async () => {
    addQuestion(ctx.app, { question_text: "Exported?", correct_answers: ["yes"], wrong_answers: ["no"], tags: ["io"] });
    const exported = await run("export out/questions.csv");
    expect(exported.response).toBe(`📤 Exported 1 question to ${path.join(dir, "out", "questions.csv")}`);

    const csv = await readFile(path.join(dir, "out", "questions.csv"), "utf8");
    expect(csv.split("\n")[1]).toBe('"Exported?","yes","no","io","","","multiple_choice"');

    const fresh: CommandContext = { app: makeContext(), now: NOW, cwd: dir };
    const imported = await processCommand("import out/questions.csv", fresh);
    expect(imported.response.split("\n")[0]).toBe("📥 Imported 1 question");
    expect(imported.mutated).toBe(true);
    expect(fresh.app.bank.questions[0].content_hash).toBe(ctx.app.bank.questions[0].content_hash);

    const again = await processCommand("import out/questions.csv", fresh);
    expect(again.response.split("\n")).toEqual(["📥 Imported 0 questions", "Skipped duplicates: 1"]);
    expect(again.mutated).toBe(false);
  });

  it("fails an import where every row is invalid", async () => {
    await writeFile(path.join(dir, "bad.csv"), "question,correct_answer\n,missing\n", "utf8");
    const res = await run("import bad.csv");
    expect(res.exitCode).toBe(1);
    expect(res.response.split("\n")).toEqual([
      "📥 Imported 0 questions",
      "Skipped duplicates: 0",
      "Errors: 1",
      "  row 2: question and correct_answer are required",
    ]);
  });

  it("reports a missing import file", async () => {
    const res = await run("import nowhere.csv");
    expect(res.exitCode).toBe(1);
    expect(res.response.startsWith("❌ ENOENT")).toBe(true);
  });

  it("writes and replaces the whole bank as JSON", async () => {
    addQuestion(ctx.app, { question_text: "Backed up" });
    await run("export-json backup.json");

    const other: CommandContext = { app: makeContext(), now: NOW, cwd: dir };
    const res = await processCommand("import-json backup.json", other);
    expect(res.mutated).toBe(true);
    expect(other.app.bank.questions.map((question) => question.question_text)).toEqual(["Backed up"]);
  });

  it("resets progress only when confirmed", async () => {
    addQuestion(ctx.app, { question_text: "Keep me" });
    ctx.app.bank.user = { rating: 1500 };

    expect((await run("reset")).exitCode).toBe(1);
    expect(ctx.app.bank.user.rating).toBe(1500);

    const res = await run("reset --yes");
    expect(res.mutated).toBe(true);
    expect(ctx.app.bank.user.rating).toBe(1200);
    expect(ctx.app.bank.questions).toHaveLength(1);
  });
});

describe("help command", () => {
  it("renders the requested topic", async () => {
    expect((await run("help")).response.split("\n")[0]).toBe("📚 quizdeck");
    expect((await run("help DATA")).response.split("\n")[0]).toBe("💾 Data");
  });
});
