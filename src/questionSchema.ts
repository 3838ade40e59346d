/**
 * Shape checks for questions returned by the content-generation service.
 *
 * Runs before shuffling: shuffleOptions assumes `correct` names one of
 * exactly four labelled options.
 */

import { z } from "zod";
import type { Question } from "./assessmentTypes";
import { QuestionValidationError } from "./errors";

export const OPTION_KEYS = ["a", "b", "c", "d"] as const;

export const OptionsSchema = z
  .object({
    a: z.string(),
    b: z.string(),
    c: z.string(),
    d: z.string(),
  })
  .strict();

export const RawQuestionSchema = z.object({
  question: z.string().min(1, "question must not be empty"),
  focus_area: z.string().optional(),
  options: OptionsSchema,
  correct: z.enum(OPTION_KEYS),
  explanation: z.string(),
});

export type RawQuestion = z.infer<typeof RawQuestionSchema>;

export type ValidationResult =
  | { ok: true; question: Question }
  | { ok: false; error: QuestionValidationError };

function toQuestion(raw: RawQuestion): Question {
  const q: Question = {
    question: raw.question,
    options: { ...raw.options },
    correct: raw.correct,
    explanation: raw.explanation,
  };
  if (raw.focus_area) q.focusArea = raw.focus_area;
  return q;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** `index` is the 0-based position of the question in its generation batch. */
export function validateQuestion(raw: unknown, index: number): ValidationResult {
  const parsed = RawQuestionSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: new QuestionValidationError(index, formatIssues(parsed.error)) };
  }
  return { ok: true, question: toQuestion(parsed.data) };
}

export type BatchValidationResult =
  | { ok: true; questions: Question[] }
  | { ok: false; error: QuestionValidationError | Error };

/** All-or-nothing: the first invalid element rejects the batch. */
export function validateBatch(raw: unknown, expectedCount: number): BatchValidationResult {
  if (!Array.isArray(raw)) {
    return { ok: false, error: new Error("Expected a JSON array of questions.") };
  }
  if (raw.length !== expectedCount) {
    return { ok: false, error: new Error(`Expected ${expectedCount} questions, received ${raw.length}.`) };
  }

  const questions: Question[] = [];
  for (let i = 0; i < raw.length; i++) {
    const result = validateQuestion(raw[i], i);
    if (!result.ok) return result;
    questions.push(result.question);
  }
  return { ok: true, questions };
}
