import { z } from "zod";

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const nonNegativeInt = z.number().int().nonnegative();

export const schedulingStateSchema = z
  .object({
    interval_days: z.number().finite().nonnegative(),
    ease_factor: z.number().finite(),
    next_review: isoDate.nullable(),
    times_answered: nonNegativeInt,
    times_correct: nonNegativeInt,
  })
  .refine((state) => state.times_correct <= state.times_answered, {
    message: "times_correct must not exceed times_answered",
    path: ["times_correct"],
  });

export const answerSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  is_correct: z.boolean(),
  explanation: z.string().nullable(),
});

export const questionSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["multiple_choice", "typed"]),
  question_text: z.string().min(1),
  objective: z.string().nullable(),
  answers: z.array(answerSchema).min(1),
  tags: z.array(z.string()),
  rating: z.number().finite(),
  scheduling: schedulingStateSchema,
  content_hash: z.string(),
  created_at: isoDate,
  last_studied: isoDate.nullable(),
});

export const attemptResultSchema = z.enum(["correct", "incorrect", "skipped"]);

export const studySessionSchema = z.object({
  id: z.string().min(1),
  question_ids: z.array(z.string()),
  results: z.record(attemptResultSchema),
  started_at: isoDate,
  ended_at: isoDate.nullable(),
});

export const reviewLogEntrySchema = z.object({
  id: z.string().min(1),
  question_id: z.string().min(1),
  session_id: z.string().nullable(),
  correct: z.boolean(),
  response_time_seconds: z.number().finite().nonnegative(),
  answered_at: isoDate,
  interval_before: z.number().finite(),
  interval_after: z.number().finite(),
  ease_before: z.number().finite(),
  ease_after: z.number().finite(),
  user_rating_before: z.number().finite(),
  user_rating_after: z.number().finite(),
  question_rating_before: z.number().finite(),
  question_rating_after: z.number().finite(),
});

export const bankDocumentSchema = z.object({
  version: z.literal(1),
  name: z.string(),
  created_at: isoDate,
  revision: nonNegativeInt,
  user: z.object({ rating: z.number().finite() }),
  questions: z.array(questionSchema),
  reviews: z.array(reviewLogEntrySchema),
  sessions: z.array(studySessionSchema),
  active_session: studySessionSchema.nullable(),
});

/** The JSON shape on disk: dates are ISO-8601 strings. */
export type BankDocument = z.input<typeof bankDocumentSchema>;
