import { z } from 'zod';
import {
  SCORE_LEVELS,
  type DocumentKind,
  type DocumentSchema,
  type DocumentTypes,
  type FallbackContext,
  type GeneratedQuestion,
  type ScoreResult,
} from './types.js';

export const SCHEMA_VERSION = '2.0';

const rubricLevelSchema = z.object({
  criteria: z.string().min(10),
  example: z.string().min(10),
});

export const QUESTION_RUBRIC_SCHEMA = z.object({
  question: z.string().min(20).max(500),
  rubric: z.object({
    poor: rubricLevelSchema,
    adequate: rubricLevelSchema,
    excellent: rubricLevelSchema,
  }),
});

export const SCORE_RESULT_SCHEMA = z.object({
  score_level: z.enum(SCORE_LEVELS),
  confidence: z.number().min(0).max(1),
  rationale: z.string().min(50),
});

export const ASSESSMENT_RECORD_SCHEMA = z.object({
  subject: z.string().min(1),
  topic: z.string().min(1),
  question: QUESTION_RUBRIC_SCHEMA.shape.question,
  rubric: QUESTION_RUBRIC_SCHEMA.shape.rubric,
  student_response: z.string().min(1),
  score: SCORE_RESULT_SCHEMA,
  metadata: z.object({
    version: z.string(),
    json_validated: z.boolean(),
    timestamp: z.string(),
  }),
});

// Keeps the fallback question under its 500 character limit.
const FALLBACK_NAME_LIMIT = 200;

function clip(text: string): string {
  return text.length > FALLBACK_NAME_LIMIT ? `${text.slice(0, FALLBACK_NAME_LIMIT - 3).trimEnd()}...` : text;
}

function questionFallback(context: FallbackContext = {}): GeneratedQuestion {
  const subject = clip(context.subject || 'General');
  const topic = clip(context.topic || 'Concepts');
  return {
    question: `Explain the key concepts of ${topic} in ${subject} and provide an example.`,
    rubric: {
      poor: {
        criteria: 'Response shows minimal understanding with significant errors or omissions',
        example: 'The student mentions the topic but demonstrates fundamental misconceptions',
      },
      adequate: {
        criteria: 'Response shows basic understanding with minor errors or missing details',
        example: 'The student covers main points but lacks depth or has minor inaccuracies',
      },
      excellent: {
        criteria: 'Response shows comprehensive understanding with accurate and detailed explanation',
        example: 'The student provides thorough, accurate explanation with relevant examples',
      },
    },
  };
}

function scoreFallback(): ScoreResult {
  return {
    score_level: 'adequate',
    confidence: 0.7,
    rationale:
      'The response demonstrates basic understanding of the topic with room for improvement in detail and accuracy.',
  };
}

const DOCUMENT_SCHEMAS: { [K in DocumentKind]: DocumentSchema<DocumentTypes[K]> } = {
  question_rubric: {
    kind: 'question_rubric',
    validator: QUESTION_RUBRIC_SCHEMA,
    fallback: questionFallback,
  },
  score_result: {
    kind: 'score_result',
    validator: SCORE_RESULT_SCHEMA,
    fallback: scoreFallback,
  },
};

export const DOCUMENT_KINDS: readonly DocumentKind[] = ['question_rubric', 'score_result'];

export function getDocumentSchema<K extends DocumentKind>(kind: K): DocumentSchema<DocumentTypes[K]> {
  return DOCUMENT_SCHEMAS[kind];
}

export function isDocumentKind(value: string): value is DocumentKind {
  return DOCUMENT_KINDS.some(kind => kind === value);
}

/** JSON Schema text embedded in prompts so the model sees the exact contract. */
export function describeSchema(kind: DocumentKind): string {
  const { $schema: _ignored, ...jsonSchema } = z.toJSONSchema(DOCUMENT_SCHEMAS[kind].validator);
  return JSON.stringify(jsonSchema, null, 2);
}
