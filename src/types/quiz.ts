import type { SchedulingState } from "../lib/scheduler.js";

export type QuestionKind = "multiple_choice" | "typed";

export type AttemptResult = "correct" | "incorrect" | "skipped";

export interface Answer {
  id: string;
  text: string;
  is_correct: boolean;
  explanation: string | null;
}

export interface Question {
  id: string;
  kind: QuestionKind;
  question_text: string;
  /** what the question is testing for */
  objective: string | null;
  answers: Answer[];
  tags: string[];
  rating: number;
  scheduling: SchedulingState;
  content_hash: string;
  created_at: Date;
  last_studied: Date | null;
}

export interface StudySession {
  id: string;
  question_ids: string[];
  results: Record<string, AttemptResult>;
  started_at: Date;
  ended_at: Date | null;
}

export interface ReviewLogEntry {
  id: string;
  question_id: string;
  session_id: string | null;
  correct: boolean;
  response_time_seconds: number;
  answered_at: Date;
  interval_before: number;
  interval_after: number;
  ease_before: number;
  ease_after: number;
  user_rating_before: number;
  user_rating_after: number;
  question_rating_before: number;
  question_rating_after: number;
}

export interface UserProfile {
  rating: number;
}

export interface Bank {
  version: 1;
  name: string;
  created_at: Date;
  /** bumped on every mutation; keys the statistics cache */
  revision: number;
  user: UserProfile;
  questions: Question[];
  reviews: ReviewLogEntry[];
  sessions: StudySession[];
  active_session: StudySession | null;
}
