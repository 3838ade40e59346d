import type { CategoryDefinition, ScoreMap, StudentInfo } from "./assessmentTypes";
import { formatOverall, rankCategories, type OverallScore } from "./scoring";

const fmt = (n: number) => n.toFixed(1);

export function buildQuestionPrompt(category: CategoryDefinition, count: number): string {
  const example = [
    "[",
    "  {",
    '    "question": "What would you do in this workplace scenario...?",',
    '    "focus_area": "one of the focus areas",',
    '    "options": {',
    '      "a": "First option description",',
    '      "b": "Second option description",',
    '      "c": "Third option description",',
    '      "d": "Fourth option description"',
    "    },",
    '    "correct": "a",',
    '    "explanation": "Explanation why this is the correct answer"',
    "  }",
    "]",
  ];

  return [
    `Generate ${count} multiple-choice questions for assessing ${category.id}.`,
    `Category Description: ${category.description}`,
    `Focus Areas: ${category.focusAreas.join(", ")}`,
    "",
    "Each question should:",
    "1. Test one of the focus areas mentioned above",
    "2. Present a realistic workplace scenario",
    "3. Have exactly 4 options labeled a, b, c, d",
    "4. Have exactly one correct answer",
    "5. Include an explanation for the correct answer",
    "",
    `Return ONLY a JSON array with exactly ${count} elements in the following format:`,
    ...example,
  ].join("\n");
}

export function buildReportPrompt(scores: ScoreMap, overall: OverallScore, student: StudentInfo): string {
  const { strengths, improvements } = rankCategories(scores, 3);

  return [
    "Generate a detailed skill gap analysis report for:",
    `Name: ${student.name}`,
    `Email: ${student.email}`,
    `Department: ${student.department}`,
    `Year: ${student.year}`,
    "",
    `Overall Score: ${formatOverall(overall)}`,
    "",
    "Detailed Scores:",
    Object.entries(scores)
      .map(([k, v]) => `${k}: ${fmt(v)}%`)
      .join(", "),
    "",
    "Top Strengths:",
    strengths.map(([k, v]) => `${k} (${fmt(v)}%)`).join(", "),
    "",
    "Areas for Improvement:",
    improvements.map(([k, v]) => `${k} (${fmt(v)}%)`).join(", "),
    "",
    "Please provide:",
    "1. Executive summary",
    "2. Detailed analysis of each skill category",
    "3. Specific recommendations for improvement",
    "4. Suggested learning resources and next steps",
    "5. Career path recommendations based on strengths",
    "6. Action plan for next 3 months",
  ].join("\n");
}
