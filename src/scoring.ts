import type { AnswerKey, AnswerLedger } from "./answerLedger";
import type { CategoryDefinition, ScoreBand, ScoreMap } from "./assessmentTypes";

export const SCORE_THRESHOLDS: Record<ScoreBand, number> = {
  Excellent: 80,
  Good: 70,
  Average: 60,
  "Needs Improvement": 0,
};

export type OverallScore = { kind: "scored"; value: number; categoryCount: number } | { kind: "empty-score-set" };

/**
 * Per-category percentage of answers matching the answer key.
 * Categories without answers are left out rather than scored 0, and a
 * missing key entry counts as incorrect.
 * `order` fixes the key order of the result; categories answered but not
 * listed follow in ledger order.
 */
export function scoreCategories(ledger: AnswerLedger, answerKey: AnswerKey, order: readonly string[] = []): ScoreMap {
  const answered = ledger.categories();
  const ordered = [...order.filter((c) => answered.includes(c)), ...answered.filter((c) => !order.includes(c))];

  const scores: ScoreMap = {};
  for (const category of ordered) {
    const answers = ledger.get(category);
    if (answers.length === 0) continue;
    let correctCount = 0;
    answers.forEach((label, i) => {
      if (label === answerKey.get(category, i)) correctCount += 1;
    });
    scores[category] = (100 * correctCount) / answers.length;
  }
  return scores;
}

/**
 * Mean of the scored categories. Divides by the number of categories that
 * have answers, not by the number configured.
 */
export function overallScore(scores: ScoreMap): OverallScore {
  const values = Object.values(scores);
  if (values.length === 0) return { kind: "empty-score-set" };
  const sum = values.reduce((s, v) => s + v, 0);
  return { kind: "scored", value: sum / values.length, categoryCount: values.length };
}

export function weightedOverallScore(scores: ScoreMap, catalog: readonly CategoryDefinition[]): OverallScore {
  let weightSum = 0;
  let total = 0;
  let count = 0;
  for (const [category, score] of Object.entries(scores)) {
    const weight = catalog.find((c) => c.id === category)?.weight ?? 1;
    weightSum += weight;
    total += weight * score;
    count += 1;
  }
  if (count === 0 || weightSum <= 0) return { kind: "empty-score-set" };
  return { kind: "scored", value: total / weightSum, categoryCount: count };
}

export function scoreBand(score: number): ScoreBand {
  if (score >= SCORE_THRESHOLDS.Excellent) return "Excellent";
  if (score >= SCORE_THRESHOLDS.Good) return "Good";
  if (score >= SCORE_THRESHOLDS.Average) return "Average";
  return "Needs Improvement";
}

/** Top `n` strengths (highest first) and improvement areas (lowest first). Ties keep map order. */
export function rankCategories(scores: ScoreMap, n = 3) {
  const entries = Object.entries(scores);
  const strengths = [...entries].sort((a, b) => b[1] - a[1]).slice(0, n);
  const improvements = [...entries].sort((a, b) => a[1] - b[1]).slice(0, n);
  return { strengths, improvements };
}

export function formatOverall(overall: OverallScore): string {
  return overall.kind === "scored" ? `${overall.value.toFixed(1)}%` : "N/A";
}
