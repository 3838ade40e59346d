import Papa from "papaparse";
import type { ScoreMap, StudentInfo } from "./assessmentTypes";
import { formatOverall, overallScore } from "./scoring";

export const SCORES_CSV_FILENAME = "assessment_scores.csv";
export const REPORT_MD_FILENAME = "full_assessment_report.md";

export function scoresToCsv(scores: ScoreMap): string {
  return Papa.unparse(
    {
      fields: ["Category", "Score"],
      data: Object.entries(scores).map(([category, score]) => [category, score.toFixed(1)]),
    },
    { newline: "\n" }
  );
}

const escapeCell = (s: string) => s.replace(/\|/g, "\\|");

export function scoresToMarkdownTable(scores: ScoreMap): string {
  const rows = Object.entries(scores).map(([category, score]) => `| ${escapeCell(category)} | ${score.toFixed(1)}% |`);
  return ["| Category | Score |", "| --- | --- |", ...rows].join("\n");
}

export type MarkdownReportInput = {
  student: StudentInfo;
  scores: ScoreMap;
  narrative: string;
};

export function buildMarkdownReport({ student, scores, narrative }: MarkdownReportInput): string {
  return [
    "# Skill Gap Analysis Report",
    "",
    "## Student Information",
    `Name: ${student.name}`,
    `Email: ${student.email}`,
    `Department: ${student.department}`,
    `Year: ${student.year}`,
    "",
    `## Overall Score: ${formatOverall(overallScore(scores))}`,
    "",
    "## Detailed Scores",
    scoresToMarkdownTable(scores),
    "",
    "## Detailed Analysis",
    narrative,
    "",
  ].join("\n");
}
