export { ReviewScheduler, DEFAULT_SCHEDULER_CONFIG, validateSchedulingState } from "./lib/scheduler.js";
export type { SchedulingState, AttemptOutcome, SchedulerConfig } from "./lib/scheduler.js";
export { RatingEngine, DEFAULT_RATING_CONFIG, DEFAULT_RATING_SPREAD } from "./lib/rating.js";
export type { RatingConfig, RatingRange, RatingUpdate } from "./lib/rating.js";
export { gradeTypedAnswer, levenshtein, normalizeAnswerText } from "./lib/text/fuzzyMatch.js";
export type { TypedAnswerVerdict } from "./lib/text/fuzzyMatch.js";
export { createLogger } from "./lib/logger.js";
export type { AppLogger, LogLevel, LoggerOptions } from "./lib/logger.js";

export * from "./errors/index.js";
export type * from "./types/quiz.js";

export { loadConfig } from "./config/env.js";
export type { AppConfig, SessionSettings } from "./config/env.js";
export { createEmptyBank, deserializeBank, loadBank, saveBank, serializeBank } from "./db/store.js";
export * from "./db/questions.js";
export { buildEngines, createAppContext, DEFAULT_SESSION_SETTINGS } from "./session/context.js";
export type { AppContext, EngineSet } from "./session/context.js";
export * from "./session/studySession.js";
export { getBankStats, clearStatsCache } from "./stats/bankStats.js";
export type { BankStats } from "./stats/bankStats.js";
export { getReviewStats, formatReviewStats } from "./stats/reviews.js";
export type { ReviewRange, ReviewStats } from "./stats/reviews.js";
export { getStreakStats } from "./stats/streaks.js";
export type { StreakStats } from "./stats/streaks.js";
export { importQuestionsFromCSV, parseCSV, questionsToCSV } from "./importExport/csv.js";
export { processCommand, parseCommand, dispatchCommand } from "./commandParser.js";
export type { CommandContext, CommandResponse } from "./commandTypes.js";
