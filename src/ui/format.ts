import type { BankStats } from "../stats/bankStats.js";
import type { StreakStats } from "../stats/streaks.js";
import type { AnswerFeedback, SessionSummary } from "../session/studySession.js";
import { displayAnswers } from "../session/studySession.js";
import { toDateKey } from "../lib/dates.js";
import { clamp01, roundTo } from "../lib/numeric.js";
import { questionKindLabel } from "../db/questions.js";
import type { Question } from "../types/quiz.js";

const num = (value: number | null | undefined, fallback = 0): number =>
  value !== null && value !== undefined && Number.isFinite(value) ? value : fallback;

export const pctStr = (p: number) => `${Math.round(clamp01(p) * 100)}%`;

export function bar(p: number, width = 15, fill = "█", empty = "░"): string {
  const filled = Math.round(clamp01(p) * width);
  return fill.repeat(filled) + empty.repeat(width - filled);
}

export const shortId = (id: string): string => id.slice(0, 8);

export function fmtRating(rating: number): string {
  return Math.round(rating).toString();
}

export function fmtDelta(delta: number): string {
  const rounded = roundTo(delta, 1);
  if (rounded > 0) return `▲ +${rounded}`;
  if (rounded < 0) return `▼ ${rounded}`;
  return "▬ 0";
}

export function fmtQuestionLine(question: Question): string {
  const tags = question.tags.length > 0 ? ` [${question.tags.join(", ")}]` : "";
  return `${shortId(question.id)}  ${question.question_text}${tags}  (${fmtRating(question.rating)})`;
}

/** The prompt shown while studying: numbered choices, or a hint to type the answer. */
export function fmtQuestionPrompt(question: Question, position?: { index: number; total: number }): string {
  const header = position ? `Question ${position.index}/${position.total}  ` : "";
  const lines = [`${header}[${shortId(question.id)}]`, question.question_text];
  if (question.objective) {
    lines.push(`Objective: ${question.objective}`);
  }
  lines.push("");

  if (question.kind === "typed") {
    lines.push(`Type your answer: answer ${shortId(question.id)} "<text>" [time=seconds]`);
  } else {
    displayAnswers(question).forEach((answer, i) => {
      lines.push(`  ${i + 1}. ${answer.text}`);
    });
    lines.push("", `Reply with: answer ${shortId(question.id)} <number> [time=seconds]`);
  }
  return lines.join("\n");
}

export function fmtQuestionDetail(question: Question, difficulty: string): string {
  const s = question.scheduling;
  const lines = [
    `${question.question_text}`,
    `id: ${question.id}`,
    `kind: ${questionKindLabel(question.kind)}`,
  ];
  if (question.objective) lines.push(`objective: ${question.objective}`);
  if (question.tags.length > 0) lines.push(`tags: ${question.tags.join(", ")}`);
  lines.push("", "Answers:");
  for (const answer of question.answers) {
    lines.push(`  ${answer.is_correct ? "✔" : "✘"} ${answer.text}${answer.explanation ? ` (${answer.explanation})` : ""}`);
  }
  lines.push(
    "",
    `Rating: ${fmtRating(question.rating)} (${difficulty})`,
    `Answered: ${s.times_answered}, correct: ${s.times_correct}`,
    `Interval: ${s.interval_days.toFixed(1)} days, ease: ${s.ease_factor.toFixed(2)}`,
    `Next review: ${s.next_review ? s.next_review.toISOString() : "not yet studied"}`,
  );
  return lines.join("\n");
}

export function fmtFeedback(feedback: AnswerFeedback): string {
  let headline: string;
  if (feedback.correct && feedback.verdict === "close") {
    headline = "💡 Close! Just a small typo.";
  } else if (feedback.correct) {
    headline = "✅ Correct!";
  } else {
    headline = `❌ Incorrect. The answer is: ${feedback.correct_answer}`;
  }

  const lines = [headline];
  if (feedback.explanation) {
    lines.push(`Explanation: ${feedback.explanation}`);
  }
  lines.push(
    "",
    `Your rating: ${fmtRating(feedback.user_rating)} ${fmtDelta(feedback.user_rating_delta)}`,
    `Question rating: ${fmtRating(feedback.question_rating)}`,
    `Next review in ${feedback.interval_days.toFixed(1)} days (${toDateKey(feedback.next_review)})`,
    `Accuracy on this question: ${Math.round(feedback.accuracy)}%`,
  );
  return lines.join("\n");
}

export function fmtSessionSummary(summary: SessionSummary): string {
  const minutes = Math.floor(summary.duration_seconds / 60);
  const seconds = summary.duration_seconds % 60;
  return [
    "🏁 Session complete",
    `Answered: ${summary.answered}  Correct: ${summary.correct}  Incorrect: ${summary.incorrect}  Skipped: ${summary.skipped}`,
    `Accuracy: ${Math.round(summary.accuracy)}%`,
    `Duration: ${minutes}m ${seconds}s`,
  ].join("\n");
}

export function fmtBankStats(stats: BankStats): string {
  const lines = [
    "📊 Question bank statistics",
    "",
    `Questions: ${stats.total_questions} (${stats.answered_questions} studied, ${stats.questions_due} due)`,
    `Sessions: ${stats.total_sessions}  Reviews: ${stats.total_reviews}`,
    `Average accuracy: ${Math.round(num(stats.average_accuracy))}%`,
    `Average ease: ${stats.average_ease !== null ? stats.average_ease.toFixed(2) : "N/A"}`,
    `Retention: ${pctStr(stats.average_retention)}`,
    `${bar(stats.average_retention)}`,
    "",
    `Your rating: ${fmtRating(stats.user_rating)} (${stats.user_level})`,
    `Recent session accuracy: ${Math.round(num(stats.recent_session_accuracy))}%`,
  ];

  if (stats.hardest_questions.length > 0) {
    lines.push("", "Hardest questions:");
    for (const q of stats.hardest_questions) {
      lines.push(`  ${fmtRating(q.rating)}  ${q.question_text}`);
    }
  }

  if (stats.top_tags.length > 0) {
    lines.push("", `Top tags: ${stats.top_tags.map((t) => `${t.tag} (${t.count})`).join(", ")}`);
  }

  return lines.join("\n");
}

export function fmtStreak(s: StreakStats): string {
  const lines = [
    "🔥 Study streak",
    `Current streak: ${s.current_streak} day${s.current_streak === 1 ? "" : "s"}`,
    `Longest streak: ${s.longest_streak} day${s.longest_streak === 1 ? "" : "s"}`,
    `Total study days: ${s.total_study_days}`,
    `Reviews today: ${s.reviews_today}`,
    `Last review: ${s.last_review_date ?? "N/A"}`,
  ];

  if (s.current_streak > 0 && s.current_streak >= s.longest_streak) {
    lines.push("🚀 Longest streak yet!");
  } else if (s.longest_streak > s.current_streak) {
    const diff = s.longest_streak - s.current_streak;
    lines.push(`➡️ ${diff} more day${diff === 1 ? "" : "s"} to beat your record.`);
  }
  return lines.join("\n");
}

export function fmtForecast(forecast: Map<string, number>): string {
  const counts = Array.from(forecast.values());
  const max = Math.max(0, ...counts);
  const lines = ["📅 Review forecast"];
  for (const [day, count] of forecast) {
    lines.push(`${day} ${bar(max > 0 ? count / max : 0, 10, "■", "□")} ${count}`);
  }
  return lines.join("\n");
}

export function fmtHelp(section: string = "main"): string {
  if (section === "study") {
    return [
      "📚 Studying",
      "",
      "study [max] [tag=a,b] [range=auto|1100-1300] → Start a session",
      "next → Show the next question",
      "answer <id> <number|text> [time=seconds] → Answer a question",
      "skip <id> → Skip a question",
      "end → Finish the session",
      "due → List due questions",
      "forecast [days] → Upcoming reviews per day",
    ].join("\n");
  }

  if (section === "questions") {
    return [
      "🗂 Managing questions",
      "",
      "add question | correct | wrong1;wrong2 | tags | objective",
      "add-tf statement | true or false | tags",
      "add-typed question | accepted1;accepted2 | tags",
      "list [tag] → List questions",
      "show <id> → Question details",
      "search <text> → Search questions and answers",
      "tags → List all tags",
      "edit <id> text=... tags=a,b objective=... → Edit a question",
      "delete <id> → Delete a question",
    ].join("\n");
  }

  if (section === "data") {
    return [
      "💾 Data",
      "",
      "import <file.csv> / export <file.csv>",
      "import-json <file> / export-json <file>",
      "stats [today|7d|30d|all] → Statistics",
      "streak → Study streak",
      "reset --yes → Forget all progress",
    ].join("\n");
  }

  return [
    "📚 quizdeck",
    "",
    "⭐ Quick start",
    "add What is 2 + 2? | 4 | 3;5 | math",
    "study → Start a review session",
    "due → See due questions",
    "",
    "More: help study, help questions, help data",
  ].join("\n");
}
