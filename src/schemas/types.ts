import type { z } from 'zod';

export const SCORE_LEVELS = ['poor', 'adequate', 'excellent'] as const;

export type ScoreLevel = (typeof SCORE_LEVELS)[number];

export interface RubricLevel {
  criteria: string;
  example: string;
}

export type Rubric = Record<ScoreLevel, RubricLevel>;

/** What the model is asked to write in the question step. */
export interface GeneratedQuestion {
  question: string;
  rubric: Rubric;
}

export interface QuestionRubric extends GeneratedQuestion {
  subject: string;
  topic: string;
}

export interface ScoreResult {
  score_level: ScoreLevel;
  confidence: number;
  rationale: string;
}

export interface AssessmentMetadata {
  version: string;
  json_validated: boolean;
  timestamp: string;
}

export interface AssessmentRecord {
  subject: string;
  topic: string;
  question: string;
  rubric: Rubric;
  student_response: string;
  score: ScoreResult;
  metadata: AssessmentMetadata;
}

export type DocumentKind = 'question_rubric' | 'score_result';

export interface DocumentTypes {
  question_rubric: GeneratedQuestion;
  score_result: ScoreResult;
}

export interface FallbackContext {
  subject?: string;
  topic?: string;
}

export interface DocumentSchema<T> {
  kind: DocumentKind;
  validator: z.ZodType<T>;
  fallback(context?: FallbackContext): T;
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };
