import { z } from "zod";
import type { StudentInfo } from "./assessmentTypes";
import { QUESTIONS_PER_CATEGORY } from "./assessmentTypes";
import { FlowError } from "./errors";

export type FlowState =
  | { phase: "collecting-student-info" }
  | { phase: "assessing"; categoryIndex: number; questionIndex: number }
  | { phase: "reporting" };

export type Phase = FlowState["phase"];

export const initialFlowState = (): FlowState => ({ phase: "collecting-student-info" });

const requiredField = (label: string) => z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);

export const StudentInfoSchema = z.object({
  name: requiredField("Name"),
  email: requiredField("Email"),
  department: requiredField("Department"),
  year: requiredField("Year"),
});

export type FieldErrors = Partial<Record<keyof StudentInfo, string>>;

export type SubmitResult =
  | { ok: true; state: FlowState; student: StudentInfo }
  | { ok: false; state: FlowState; errors: FieldErrors };

function toFieldErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path[0];
    if ((key === "name" || key === "email" || key === "department" || key === "year") && !errors[key]) {
      errors[key] = issue.message;
    }
  }
  return errors;
}

/**
 * collecting-student-info -> assessing (or straight to reporting when there
 * are no categories). Invalid input leaves the state as it was.
 */
export function submitStudentInfo(state: FlowState, input: unknown, categoryCount: number): SubmitResult {
  if (state.phase !== "collecting-student-info") {
    throw new FlowError(`Student info can only be submitted before the assessment starts (phase: ${state.phase}).`);
  }

  const parsed = StudentInfoSchema.safeParse(input);
  if (!parsed.success) return { ok: false, state, errors: toFieldErrors(parsed.error) };

  const next: FlowState =
    categoryCount > 0 ? { phase: "assessing", categoryIndex: 0, questionIndex: 0 } : { phase: "reporting" };
  return { ok: true, state: next, student: parsed.data };
}

/** Moves past the current question. The last question of the last category ends the assessment. */
export function advance(
  state: FlowState,
  categoryCount: number,
  questionsPerCategory: number = QUESTIONS_PER_CATEGORY
): FlowState {
  if (state.phase !== "assessing") {
    throw new FlowError(`Cannot advance outside the assessment (phase: ${state.phase}).`);
  }

  if (state.questionIndex < questionsPerCategory - 1) {
    return { ...state, questionIndex: state.questionIndex + 1 };
  }

  const categoryIndex = state.categoryIndex + 1;
  if (categoryIndex >= categoryCount) return { phase: "reporting" };
  return { phase: "assessing", categoryIndex, questionIndex: 0 };
}

/** Fraction of all questions already answered, 0..1. */
export function flowProgress(
  state: FlowState,
  categoryCount: number,
  questionsPerCategory: number = QUESTIONS_PER_CATEGORY
): number {
  switch (state.phase) {
    case "collecting-student-info":
      return 0;
    case "reporting":
      return 1;
    case "assessing": {
      const total = categoryCount * questionsPerCategory;
      if (total === 0) return 1;
      return (state.categoryIndex * questionsPerCategory + state.questionIndex) / total;
    }
  }
}
