export * from "./assessmentTypes";
export { DEFAULT_CATALOG, SKILL_CATEGORIES, STUDENT_YEARS, findCategory, listCategoryIds } from "./categories";
export type { SkillCategory } from "./categories";

export { ConfigError, FlowError, QuestionValidationError, getErrorMessage } from "./errors";
export { createLogger, Logger } from "./logger";
export type { LogLevel } from "./logger";
export { loadConfig } from "./config";
export type { AppConfig, ContentProvider } from "./config";

export { HttpContentService } from "./aiClient";
export type { CompletionOptions, ContentGenerationService } from "./aiClient";
export { ChatCompletionsService, OpenAIResponsesService, createContentService } from "./llmProviders";

export { mulberry32, shuffleOptions } from "./shuffle";
export type { RNG } from "./shuffle";
export { validateBatch, validateQuestion } from "./questionSchema";
export { buildFallbackQuestions } from "./offlineBank";
export { QuestionGenerator, createQuestionGenerator } from "./questionGenerator";
export type { BatchResult, GeneratedSet, GenerationFailureKind, QuestionGeneratorOptions } from "./questionGenerator";

export { AnswerKey, AnswerLedger } from "./answerLedger";
export {
  SCORE_THRESHOLDS,
  formatOverall,
  overallScore,
  rankCategories,
  scoreBand,
  scoreCategories,
  weightedOverallScore,
} from "./scoring";
export type { OverallScore } from "./scoring";

export { advance, flowProgress, initialFlowState, submitStudentInfo } from "./assessmentFlow";
export type { FieldErrors, FlowState, Phase, SubmitResult } from "./assessmentFlow";
export { AssessmentSession } from "./assessmentSession";
export type { CurrentQuestion, ReportSummary, SessionOptions } from "./assessmentSession";

export { NO_DATA_REPORT, generateReport } from "./report";
export {
  REPORT_MD_FILENAME,
  SCORES_CSV_FILENAME,
  buildMarkdownReport,
  scoresToCsv,
  scoresToMarkdownTable,
} from "./exporters";
