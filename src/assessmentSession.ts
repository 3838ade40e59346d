import { AnswerKey, AnswerLedger } from "./answerLedger";
import {
  advance,
  flowProgress,
  initialFlowState,
  submitStudentInfo,
  type FlowState,
  type SubmitResult,
} from "./assessmentFlow";
import type { AnswerFeedback, CategoryDefinition, Question, ScoreBand, ScoreMap, StudentInfo } from "./assessmentTypes";
import { QUESTIONS_PER_CATEGORY } from "./assessmentTypes";
import { FlowError } from "./errors";
import type { GeneratedSet, QuestionGenerator } from "./questionGenerator";
import { overallScore, scoreBand, scoreCategories, weightedOverallScore, type OverallScore } from "./scoring";

export type CurrentQuestion = {
  category: CategoryDefinition;
  categoryIndex: number;
  questionIndex: number;
  questionNumber: number;
  question: Question;
};

export type ReportSummary = {
  student: StudentInfo;
  scores: ScoreMap;
  overall: OverallScore;
  weightedOverall: OverallScore;
  bands: Record<string, ScoreBand>;
};

export type SessionOptions = {
  generator: QuestionGenerator;
  /** Categories to assess, in order. Defaults to the generator's catalog. */
  categories?: readonly string[];
};

function newSessionId() {
  return `assessment-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * One student's pass through the assessment. Owns its own answer key and
 * ledger; nothing is shared between sessions.
 */
export class AssessmentSession {
  readonly sessionId = newSessionId();
  readonly createdAtISO = new Date().toISOString();
  readonly categories: readonly CategoryDefinition[];
  readonly answerKey = new AnswerKey();
  readonly ledger = new AnswerLedger();

  private flow: FlowState = initialFlowState();
  private studentInfo: StudentInfo | null = null;
  private readonly questionSets = new Map<string, GeneratedSet>();
  private readonly pending = new Map<string, Promise<GeneratedSet>>();
  private readonly generator: QuestionGenerator;

  constructor(opts: SessionOptions) {
    this.generator = opts.generator;
    const ids = opts.categories ?? opts.generator.catalog.map((c) => c.id);
    this.categories = ids.map((id) => opts.generator.lookup(id));
  }

  get state(): FlowState {
    return this.flow;
  }

  get student(): StudentInfo | null {
    return this.studentInfo;
  }

  submitStudentInfo(input: unknown): SubmitResult {
    const result = submitStudentInfo(this.flow, input, this.categories.length);
    if (result.ok) {
      this.flow = result.state;
      this.studentInfo = result.student;
    }
    return result;
  }

  /** Generated set for a category, fetched on first request and cached afterwards. */
  async questionSet(categoryId: string): Promise<GeneratedSet> {
    const cached = this.questionSets.get(categoryId);
    if (cached) return cached;

    let inflight = this.pending.get(categoryId);
    if (!inflight) {
      inflight = this.generator.generateSet(categoryId, this.answerKey, this.sessionId);
      this.pending.set(categoryId, inflight);
    }
    try {
      const set = await inflight;
      this.questionSets.set(categoryId, set);
      return set;
    } finally {
      this.pending.delete(categoryId);
    }
  }

  async currentQuestion(): Promise<CurrentQuestion | null> {
    const flow = this.flow;
    if (flow.phase !== "assessing") return null;

    const category = this.categories[flow.categoryIndex];
    const set = await this.questionSet(category.id);
    return {
      category,
      categoryIndex: flow.categoryIndex,
      questionIndex: flow.questionIndex,
      questionNumber: flow.questionIndex + 1,
      question: set.questions[flow.questionIndex],
    };
  }

  async answer(label: string): Promise<AnswerFeedback> {
    const current = await this.currentQuestion();
    if (!current) throw new FlowError(`No question to answer (phase: ${this.flow.phase}).`);

    const { category, questionIndex, question } = current;
    if (!Object.hasOwn(question.options, label)) {
      throw new FlowError(`"${label}" is not an option for ${category.id} question ${questionIndex + 1}.`);
    }

    this.ledger.record(category.id, questionIndex, label);
    this.flow = advance(this.flow, this.categories.length, QUESTIONS_PER_CATEGORY);

    const correctLabel = this.answerKey.get(category.id, questionIndex) ?? question.correct;
    return {
      category: category.id,
      questionIndex,
      selected: label,
      isCorrect: label === correctLabel,
      correctLabel,
      correctText: question.options[correctLabel] ?? "",
      explanation: question.explanation,
    };
  }

  progress(): number {
    return flowProgress(this.flow, this.categories.length, QUESTIONS_PER_CATEGORY);
  }

  scores(): ScoreMap {
    return scoreCategories(
      this.ledger,
      this.answerKey,
      this.categories.map((c) => c.id)
    );
  }

  overall(): OverallScore {
    return overallScore(this.scores());
  }

  reportSummary(): ReportSummary {
    if (!this.studentInfo) throw new FlowError("Student info has not been submitted.");
    const scores = this.scores();
    const bands: Record<string, ScoreBand> = {};
    for (const [category, score] of Object.entries(scores)) bands[category] = scoreBand(score);
    return {
      student: this.studentInfo,
      scores,
      overall: overallScore(scores),
      weightedOverall: weightedOverallScore(scores, this.categories),
      bands,
    };
  }
}
