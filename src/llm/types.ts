import type Anthropic from '@anthropic-ai/sdk';
import type { MetricsSink } from '../metrics/types.js';
import type { TransientNetworkError } from '../errors.js';

/**
 * Transport to a text generation service. Implementations throw
 * TransientNetworkError for failures worth retrying and anything else for
 * failures that are not.
 */
export interface TextGenerationBackend {
  complete(prompt: string): Promise<string>;
}

export interface LLMClientOptions {
  metrics: MetricsSink;
  networkRetries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onNetworkRetry?: (error: TransientNetworkError, retryNumber: number) => void;
}

/** The slice of the SDK's `messages` resource the backend calls. */
export interface MessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<{
    content: ReadonlyArray<{ type: string; text?: string }>;
  }>;
}

export interface AnthropicBackendOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  system?: string;
  /** Defaults to a fresh SDK client built from `apiKey`. */
  messages?: MessagesApi;
}
