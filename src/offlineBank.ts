import type { CategoryDefinition, Question } from "./assessmentTypes";
import { QUESTIONS_PER_CATEGORY } from "./assessmentTypes";

export const FALLBACK_EXPLANATION = "This is a default question because content generation was unavailable.";

/**
 * Deterministic placeholder set used when the content service is down or its
 * output is unusable. Always passes validation; `correct` is "a" before shuffling.
 */
export function buildFallbackQuestions(
  category: CategoryDefinition,
  count: number = QUESTIONS_PER_CATEGORY
): Question[] {
  const areas = category.focusAreas;
  return Array.from({ length: count }, (_, i) => {
    const q: Question = {
      question: `Sample question ${i + 1} for ${category.id}`,
      options: {
        a: "Option A",
        b: "Option B",
        c: "Option C",
        d: "Option D",
      },
      correct: "a",
      explanation: FALLBACK_EXPLANATION,
    };
    if (areas.length) q.focusArea = areas[i % areas.length];
    return q;
  });
}
