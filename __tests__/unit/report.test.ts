import { describe, it, expect, vi } from "vitest";
import { buildReportPrompt } from "../../src/prompts";
import { NO_DATA_REPORT, generateReport } from "../../src/report";
import { overallScore } from "../../src/scoring";
import { ScriptedService, failingService } from "./fakes";

const student = { name: "Test Student", email: "student@example.com", department: "Engineering", year: "4th Year" };

describe("buildReportPrompt", () => {
  it("includes identity, scores, strengths and improvements", () => {
    const scores = { A: 100, B: 50 };
    const prompt = buildReportPrompt(scores, overallScore(scores), student);
    const lines = prompt.split("\n");

    expect(lines).toContain("Name: Test Student");
    expect(lines).toContain("Year: 4th Year");
    expect(lines).toContain("Overall Score: 75.0%");
    expect(lines).toContain("A: 100.0%, B: 50.0%");
    expect(lines[lines.indexOf("Top Strengths:") + 1]).toBe("A (100.0%), B (50.0%)");
    expect(lines[lines.indexOf("Areas for Improvement:") + 1]).toBe("B (50.0%), A (100.0%)");
    expect(lines).toContain("6. Action plan for next 3 months");
  });
});

describe("generateReport", () => {
  it("returns the service narrative", async () => {
    const service = new ScriptedService(() => "## Executive summary\nSolid foundation.");
    const report = await generateReport(service, { A: 80 }, student);
    expect(report).toBe("## Executive summary\nSolid foundation.");
    expect(service.calls[0].signal).toBeInstanceOf(AbortSignal);
  });

  it("degrades to an error string when the service fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const report = await generateReport(failingService("quota exceeded"), { A: 80 }, student);
    expect(report).toBe("Error generating report: quota exceeded");
  });

  it("reports no data without calling the service", async () => {
    const service = new ScriptedService(() => "unused");
    expect(await generateReport(service, {}, student)).toBe(NO_DATA_REPORT);
    expect(service.prompts).toHaveLength(0);
  });
});
