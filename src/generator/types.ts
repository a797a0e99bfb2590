import type { FallbackContext } from '../schemas/types.js';
import type { MetricsSink } from '../metrics/types.js';

export interface PromptSender {
  generate(prompt: string): Promise<string>;
}

export interface AttemptFailure {
  attempt: number;
  errors: string[];
}

export interface GenerationOutcome<T> {
  document: T;
  succeededOnFirstTry: boolean;
  usedFallback: boolean;
  /** Number of prompts sent, not counting network-level retries. */
  attempts: number;
  failures: AttemptFailure[];
}

export interface GenerateOptions {
  maxAttempts?: number;
  context?: FallbackContext;
}

export interface ValidatedGeneratorOptions {
  metrics: MetricsSink;
  maxAttempts?: number;
  onRetry?: (failedAttempt: number, errors: string[]) => void;
  onFallback?: (failures: AttemptFailure[]) => void;
}

export type ParsedResponse =
  | { ok: true; value: unknown }
  | { ok: false; error: string };
