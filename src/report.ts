import type { ContentGenerationService } from "./aiClient";
import type { ScoreMap, StudentInfo } from "./assessmentTypes";
import { DEFAULT_GENERATION_TIMEOUT_MS } from "./config";
import { getErrorMessage } from "./errors";
import { createLogger } from "./logger";
import { buildReportPrompt } from "./prompts";
import { overallScore } from "./scoring";

const log = createLogger("report");

export const NO_DATA_REPORT = "No assessment data available: no skill category has recorded answers.";

export type ReportOptions = { timeoutMs?: number; maxTokens?: number };

/**
 * Narrative gap analysis from the content service. Failures come back as an
 * "Error generating report: ..." string so numeric scores can still be shown.
 */
export async function generateReport(
  service: ContentGenerationService,
  scores: ScoreMap,
  student: StudentInfo,
  opts: ReportOptions = {}
): Promise<string> {
  const overall = overallScore(scores);
  if (overall.kind === "empty-score-set") return NO_DATA_REPORT;

  try {
    return await service.complete(buildReportPrompt(scores, overall, student), {
      maxTokens: opts.maxTokens,
      signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS),
    });
  } catch (e) {
    const message = getErrorMessage(e);
    log.error("Report generation failed:", message);
    return `Error generating report: ${message}`;
  }
}
