import type { GenerationOutcome } from '../generator/types.js';
import type { GeneratedQuestion, ScoreResult } from '../schemas/types.js';

export type SessionState =
  | 'awaiting-subject-topic'
  | 'generating-question'
  | 'awaiting-response'
  | 'scoring'
  | 'complete'
  | 'aborted';

export interface SessionOptions {
  maxAttempts?: number;
  now?: () => Date;
}

export interface SessionOutcomes {
  question?: GenerationOutcome<GeneratedQuestion>;
  score?: GenerationOutcome<ScoreResult>;
}
