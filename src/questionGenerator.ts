/**
 * Category -> validated, shuffled question set.
 *
 * The content service is injected; every way it can fail (error, timeout,
 * unparseable output, a batch that does not validate) comes back as a
 * `BatchResult` failure and resolves to the deterministic fallback set.
 * `generate` itself only throws for an unknown category.
 */

import { randomUUID } from "crypto";
import type { ContentGenerationService } from "./aiClient";
import type { AnswerKey } from "./answerLedger";
import type { CategoryDefinition, Question } from "./assessmentTypes";
import { QUESTIONS_PER_CATEGORY } from "./assessmentTypes";
import { DEFAULT_CATALOG, findCategory } from "./categories";
import { DEFAULT_GENERATION_TIMEOUT_MS, type AppConfig } from "./config";
import { ConfigError, getErrorMessage, isAbortError } from "./errors";
import { createContentService } from "./llmProviders";
import { createLogger, type Logger } from "./logger";
import { buildFallbackQuestions } from "./offlineBank";
import { buildQuestionPrompt } from "./prompts";
import { validateBatch } from "./questionSchema";
import { extractJsonArray } from "./responseParser";
import { mathRandom, shuffleOptions, type RNG } from "./shuffle";

export type GenerationFailureKind = "service-error" | "timeout" | "malformed-json" | "validation";

export type BatchResult =
  | { ok: true; questions: Question[] }
  | { ok: false; kind: GenerationFailureKind; message: string };

export type GenerationSource = "service" | "fallback";

export type GeneratedSet = {
  category: string;
  source: GenerationSource;
  questions: Question[];
  failure?: { kind: GenerationFailureKind; message: string };
};

export type QuestionGeneratorOptions = {
  service: ContentGenerationService;
  catalog?: readonly CategoryDefinition[];
  rng?: RNG;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
};

export class QuestionGenerator {
  readonly catalog: readonly CategoryDefinition[];
  private readonly service: ContentGenerationService;
  private readonly rng: RNG;
  readonly timeoutMs: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly log: Logger;

  constructor(opts: QuestionGeneratorOptions) {
    this.service = opts.service;
    this.catalog = opts.catalog ?? DEFAULT_CATALOG;
    this.rng = opts.rng ?? mathRandom;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.temperature = opts.temperature ?? 0.3;
    this.maxTokens = opts.maxTokens ?? 2000;
    this.log = opts.logger ?? createLogger("question-generator");
  }

  lookup(categoryId: string): CategoryDefinition {
    const category = findCategory(this.catalog, categoryId);
    if (!category) throw new ConfigError(`Unknown category: ${categoryId}`);
    return category;
  }

  /**
   * One attempt against the content service; never throws.
   * `generationId` scopes any response caching behind the service to one caller.
   */
  async requestBatch(category: CategoryDefinition, generationId: string = randomUUID()): Promise<BatchResult> {
    const prompt = buildQuestionPrompt(category, QUESTIONS_PER_CATEGORY);

    let text: string;
    try {
      text = await this.service.complete(prompt, {
        temperature: this.temperature,
        maxTokens: this.maxTokens,
        generationId,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      if (isAbortError(e)) {
        return { ok: false, kind: "timeout", message: `No response within ${this.timeoutMs}ms` };
      }
      return { ok: false, kind: "service-error", message: getErrorMessage(e) };
    }

    let parsed: unknown;
    try {
      parsed = extractJsonArray(text);
    } catch (e) {
      return { ok: false, kind: "malformed-json", message: getErrorMessage(e) };
    }

    const validated = validateBatch(parsed, QUESTIONS_PER_CATEGORY);
    if (!validated.ok) return { ok: false, kind: "validation", message: validated.error.message };
    return { ok: true, questions: validated.questions };
  }

  /**
   * Generates, shuffles and records the answer key for one category.
   * Regenerating a category replaces its answer-key entries.
   */
  async generateSet(categoryId: string, answerKey: AnswerKey, generationId?: string): Promise<GeneratedSet> {
    const category = this.lookup(categoryId);
    const batch = await this.requestBatch(category, generationId);

    let source: GenerationSource = "service";
    let base: Question[];
    let failure: GeneratedSet["failure"];
    if (batch.ok) {
      base = batch.questions;
    } else {
      this.log.warn(`Falling back to default questions for ${category.id} (${batch.kind}): ${batch.message}`);
      source = "fallback";
      failure = { kind: batch.kind, message: batch.message };
      base = buildFallbackQuestions(category);
    }

    const questions = base.map((q) => shuffleOptions(q, this.rng));
    answerKey.clear(category.id);
    questions.forEach((q, i) => answerKey.set(category.id, i, q.correct));

    this.log.debug(`Generated ${questions.length} questions for ${category.id} from ${source}`);
    return failure ? { category: category.id, source, questions, failure } : { category: category.id, source, questions };
  }

  async generate(categoryId: string, answerKey: AnswerKey, generationId?: string): Promise<Question[]> {
    const set = await this.generateSet(categoryId, answerKey, generationId);
    return set.questions;
  }
}

/** Generator wired from environment configuration. */
export function createQuestionGenerator(
  config: AppConfig,
  opts: Pick<QuestionGeneratorOptions, "catalog" | "rng"> = {}
): QuestionGenerator {
  return new QuestionGenerator({
    ...opts,
    service: createContentService(config),
    timeoutMs: config.generationTimeoutMs,
    logger: createLogger("question-generator", config.logLevel),
  });
}
