export const QUESTIONS_PER_CATEGORY = 5;

export type CategoryDefinition = {
  id: string;
  description: string;
  focusAreas: string[];
  /** Relative importance in the weighted overall score. */
  weight: number;
};

/** Option label ("a".."d") to option text. Key order carries no meaning once shuffled. */
export type OptionMap = Record<string, string>;

export type Question = {
  question: string;
  focusArea?: string;
  options: OptionMap;
  correct: string;
  explanation?: string;
};

export type StudentInfo = {
  name: string;
  email: string;
  department: string;
  year: string;
};

/** Category -> percentage score in [0, 100]. Only categories with answers appear. */
export type ScoreMap = Record<string, number>;

export type ScoreBand = "Excellent" | "Good" | "Average" | "Needs Improvement";

export type AnswerFeedback = {
  category: string;
  questionIndex: number;
  selected: string;
  isCorrect: boolean;
  correctLabel: string;
  correctText: string;
  explanation?: string;
};
