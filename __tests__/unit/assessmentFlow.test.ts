import { describe, it, expect } from "vitest";
import { advance, flowProgress, initialFlowState, submitStudentInfo, type FlowState } from "../../src/assessmentFlow";
import { STUDENT_YEARS } from "../../src/categories";
import { FlowError } from "../../src/errors";

const student = { name: "Test Student", email: "student@example.com", department: "Engineering", year: "2nd Year" };

describe("submitStudentInfo", () => {
  it("starts the assessment at the first question", () => {
    const result = submitStudentInfo(initialFlowState(), student, 8);
    expect(result).toEqual({
      ok: true,
      state: { phase: "assessing", categoryIndex: 0, questionIndex: 0 },
      student,
    });
  });

  it("trims field values", () => {
    const result = submitStudentInfo(initialFlowState(), { ...student, name: "  Test Student  " }, 1);
    expect(result.ok && result.student.name).toBe("Test Student");
  });

  it("keeps the state and reports each missing field", () => {
    const state = initialFlowState();
    const result = submitStudentInfo(state, { name: " ", email: "student@example.com" }, 8);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.state).toBe(state);
    expect(result.errors).toEqual({
      name: "Name is required",
      department: "Department is required",
      year: "Year is required",
    });
  });

  it.each(STUDENT_YEARS)("accepts the conventional year %s", (year) => {
    const result = submitStudentInfo(initialFlowState(), { ...student, year }, 8);
    expect(result.ok && result.student.year).toBe(year);
  });

  it("goes straight to reporting when there are no categories", () => {
    expect(submitStudentInfo(initialFlowState(), student, 0).state).toEqual({ phase: "reporting" });
  });

  it("cannot be submitted twice", () => {
    const assessing: FlowState = { phase: "assessing", categoryIndex: 0, questionIndex: 0 };
    expect(() => submitStudentInfo(assessing, student, 8)).toThrow(FlowError);
  });
});

describe("advance", () => {
  it("moves to the next category after five answers", () => {
    let state: FlowState = { phase: "assessing", categoryIndex: 0, questionIndex: 0 };
    for (let i = 0; i < 4; i++) {
      state = advance(state, 2);
      expect(state).toEqual({ phase: "assessing", categoryIndex: 0, questionIndex: i + 1 });
    }
    state = advance(state, 2);
    expect(state).toEqual({ phase: "assessing", categoryIndex: 1, questionIndex: 0 });
  });

  it("ends in reporting after the last question of the last category", () => {
    const last: FlowState = { phase: "assessing", categoryIndex: 1, questionIndex: 4 };
    expect(advance(last, 2)).toEqual({ phase: "reporting" });
  });

  it("does not mutate the previous state", () => {
    const state: FlowState = { phase: "assessing", categoryIndex: 0, questionIndex: 2 };
    advance(state, 2);
    expect(state).toEqual({ phase: "assessing", categoryIndex: 0, questionIndex: 2 });
  });

  it("has no transition out of reporting or before the start", () => {
    expect(() => advance({ phase: "reporting" }, 2)).toThrow(FlowError);
    expect(() => advance(initialFlowState(), 2)).toThrow(FlowError);
  });
});

describe("flowProgress", () => {
  it("reports answered fraction", () => {
    expect(flowProgress(initialFlowState(), 2)).toBe(0);
    expect(flowProgress({ phase: "assessing", categoryIndex: 1, questionIndex: 0 }, 2)).toBe(0.5);
    expect(flowProgress({ phase: "assessing", categoryIndex: 0, questionIndex: 1 }, 2)).toBe(0.1);
    expect(flowProgress({ phase: "reporting" }, 2)).toBe(1);
  });
});
