export type {
  ScoreLevel,
  RubricLevel,
  Rubric,
  GeneratedQuestion,
  QuestionRubric,
  ScoreResult,
  AssessmentMetadata,
  AssessmentRecord,
  DocumentKind,
  DocumentTypes,
  DocumentSchema,
  FallbackContext,
  ValidationResult,
} from './types.js';

export { SCORE_LEVELS } from './types.js';

export {
  SCHEMA_VERSION,
  QUESTION_RUBRIC_SCHEMA,
  SCORE_RESULT_SCHEMA,
  ASSESSMENT_RECORD_SCHEMA,
  DOCUMENT_KINDS,
  getDocumentSchema,
  isDocumentKind,
  describeSchema,
} from './registry.js';

export { validateDocument } from './validator.js';
