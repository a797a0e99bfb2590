export type {
  PromptSender,
  AttemptFailure,
  GenerationOutcome,
  GenerateOptions,
  ValidatedGeneratorOptions,
  ParsedResponse,
} from './types.js';
export { ValidatedGenerator, checkResponse, DEFAULT_MAX_ATTEMPTS } from './validated-generator.js';
export { stripCodeFences, extractJsonText, parseJsonResponse } from './json-extract.js';
export {
  buildSystemPrompt,
  buildQuestionPrompt,
  buildScoringPrompt,
  buildFeedbackPrompt,
  formatFailures,
  fillTemplate,
} from './prompt-builder.js';
