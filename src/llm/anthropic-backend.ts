import Anthropic from '@anthropic-ai/sdk';
import { TransientNetworkError } from '../errors.js';
import type { AnthropicBackendOptions, MessagesApi, TextGenerationBackend } from './types.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicBackend implements TextGenerationBackend {
  private messages: MessagesApi;
  private model: string;
  private maxTokens: number;
  private system?: string;

  constructor(options: AnthropicBackendOptions) {
    // Retries belong to LLMClient, so the SDK's own are switched off.
    this.messages = options.messages ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0 }).messages;
    this.model = options.model || DEFAULT_MODEL;
    this.maxTokens = options.maxTokens || DEFAULT_MAX_TOKENS;
    this.system = options.system;
  }

  async complete(prompt: string): Promise<string> {
    let response: Awaited<ReturnType<MessagesApi['create']>>;
    try {
      response = await this.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        ...(this.system ? { system: this.system } : {}),
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      throw classifyAnthropicError(error);
    }

    return response.content
      .map(block => (block.type === 'text' ? block.text ?? '' : ''))
      .join('');
  }
}

/** Timeouts, dropped connections, 429 and 5xx are retried; everything else is not. */
export function classifyAnthropicError(error: unknown): unknown {
  if (
    error instanceof Anthropic.APIConnectionError ||
    error instanceof Anthropic.RateLimitError ||
    error instanceof Anthropic.InternalServerError
  ) {
    return new TransientNetworkError(error.message, { cause: error });
  }
  return error;
}
