import type { AssessmentRecord, GeneratedQuestion, ScoreResult } from '../schemas/types.js';

export const VALID_QUESTION: GeneratedQuestion = {
  question: 'Explain how light energy is converted into chemical energy during photosynthesis.',
  rubric: {
    poor: {
      criteria: 'Mentions sunlight but does not explain any energy conversion',
      example: 'Plants need the sun to grow.',
    },
    adequate: {
      criteria: 'Describes chlorophyll absorbing light and glucose being produced',
      example: 'Chlorophyll captures light and the plant makes sugar from it.',
    },
    excellent: {
      criteria: 'Connects the light-dependent reactions to ATP, NADPH and the Calvin cycle',
      example: 'Light splits water, producing ATP and NADPH that power carbon fixation.',
    },
  },
};

export const VALID_SCORE: ScoreResult = {
  score_level: 'excellent',
  confidence: 0.85,
  rationale: 'The answer links the light-dependent reactions to the Calvin cycle and names ATP and NADPH correctly.',
};

export const STUDENT_RESPONSE =
  'Chlorophyll absorbs light, which splits water and makes ATP and NADPH. The Calvin cycle then uses them to fix carbon dioxide into glucose.';

export function fenced(document: unknown, language = 'json'): string {
  return '```' + language + '\n' + JSON.stringify(document, null, 2) + '\n```';
}

export function sampleRecord(overrides: Partial<AssessmentRecord> = {}): AssessmentRecord {
  return {
    subject: 'Biology',
    topic: 'Photosynthesis',
    question: VALID_QUESTION.question,
    rubric: VALID_QUESTION.rubric,
    student_response: STUDENT_RESPONSE,
    score: VALID_SCORE,
    metadata: {
      version: '2.0',
      json_validated: true,
      timestamp: '2026-03-01T10:00:00.000Z',
    },
    ...overrides,
  };
}
