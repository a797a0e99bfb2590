import type { DocumentSchema, ValidationResult } from '../schemas/types.js';
import { validateDocument } from '../schemas/validator.js';
import type { MetricsSink } from '../metrics/types.js';
import { parseJsonResponse } from './json-extract.js';
import { buildFeedbackPrompt } from './prompt-builder.js';
import type {
  AttemptFailure,
  GenerateOptions,
  GenerationOutcome,
  PromptSender,
  ValidatedGeneratorOptions,
} from './types.js';

export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Turns free-form model output into schema-valid documents.
 *
 * Each attempt sends a prompt, strips any markdown fencing, parses and
 * validates the result. Parse and schema failures are fed back to the model
 * on the next attempt; once attempts run out the schema's fallback document is
 * returned instead. Only request failures from the client escape.
 */
export class ValidatedGenerator {
  private client: PromptSender;
  private metrics: MetricsSink;
  private maxAttempts: number;
  private onRetry?: ValidatedGeneratorOptions['onRetry'];
  private onFallback?: ValidatedGeneratorOptions['onFallback'];

  constructor(client: PromptSender, options: ValidatedGeneratorOptions) {
    this.client = client;
    this.metrics = options.metrics;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.onRetry = options.onRetry;
    this.onFallback = options.onFallback;
  }

  async generateValidated<T>(
    basePrompt: string,
    documentSchema: DocumentSchema<T>,
    options: GenerateOptions = {}
  ): Promise<GenerationOutcome<T>> {
    const maxAttempts = options.maxAttempts ?? this.maxAttempts;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    const failures: AttemptFailure[] = [];
    let prompt = basePrompt;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const raw = await this.client.generate(prompt);
      const result = checkResponse(raw, documentSchema);

      if (result.valid) {
        this.metrics.recordValidationSuccess(attempt === 1);
        return {
          document: result.value,
          succeededOnFirstTry: attempt === 1,
          usedFallback: false,
          attempts: attempt,
          failures,
        };
      }

      failures.push({ attempt, errors: result.errors });

      if (attempt < maxAttempts) {
        this.metrics.recordRetry();
        this.onRetry?.(attempt, result.errors);
        prompt = buildFeedbackPrompt(basePrompt, failures);
      }
    }

    this.metrics.recordFallback();
    this.onFallback?.(failures);

    return {
      document: documentSchema.fallback(options.context),
      succeededOnFirstTry: false,
      usedFallback: true,
      attempts: maxAttempts,
      failures,
    };
  }
}

export function checkResponse<T>(raw: string, documentSchema: DocumentSchema<T>): ValidationResult<T> {
  const parsed = parseJsonResponse(raw);
  if (!parsed.ok) {
    return { valid: false, errors: [parsed.error] };
  }
  return validateDocument(parsed.value, documentSchema.validator);
}
