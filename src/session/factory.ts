import type { AssessorConfig } from '../config/index.js';
import { ValidatedGenerator } from '../generator/validated-generator.js';
import { buildSystemPrompt } from '../generator/prompt-builder.js';
import type { ValidatedGeneratorOptions } from '../generator/types.js';
import { AnthropicBackend } from '../llm/anthropic-backend.js';
import { LLMClient } from '../llm/client.js';
import type { LLMClientOptions, TextGenerationBackend } from '../llm/types.js';
import type { MetricsSink } from '../metrics/types.js';
import { AssessmentSession } from './assessment-session.js';
import type { SessionOptions } from './types.js';

export interface SessionHooks {
  onNetworkRetry?: LLMClientOptions['onNetworkRetry'];
  onRetry?: ValidatedGeneratorOptions['onRetry'];
  onFallback?: ValidatedGeneratorOptions['onFallback'];
}

export interface CreateSessionOptions extends SessionHooks, SessionOptions {
  metrics: MetricsSink;
  backend?: TextGenerationBackend;
}

/** Wires backend → client → generator → session from one resolved config. */
export function createSession(config: AssessorConfig, options: CreateSessionOptions): AssessmentSession {
  const backend =
    options.backend ??
    new AnthropicBackend({
      apiKey: config.apiKey,
      model: config.model,
      maxTokens: config.maxTokens,
      system: buildSystemPrompt(),
    });

  const client = new LLMClient(backend, {
    metrics: options.metrics,
    networkRetries: config.networkRetries,
    retryDelayMs: config.retryDelayMs,
    onNetworkRetry: options.onNetworkRetry,
  });

  const generator = new ValidatedGenerator(client, {
    metrics: options.metrics,
    maxAttempts: config.maxAttempts,
    onRetry: options.onRetry,
    onFallback: options.onFallback,
  });

  return new AssessmentSession(generator, {
    maxAttempts: options.maxAttempts,
    now: options.now,
  });
}
