import { setTimeout as delay } from 'node:timers/promises';
import { LLMRequestError, TransientNetworkError } from '../errors.js';
import type { MetricsSink } from '../metrics/types.js';
import type { LLMClientOptions, TextGenerationBackend } from './types.js';

export const DEFAULT_NETWORK_RETRIES = 1;
export const DEFAULT_RETRY_DELAY_MS = 3000;

/**
 * Sends prompts to a backend and owns the network-level retry policy.
 * Output quality is not its concern: text is returned exactly as received.
 */
export class LLMClient {
  private backend: TextGenerationBackend;
  private metrics: MetricsSink;
  private networkRetries: number;
  private retryDelayMs: number;
  private sleep: (ms: number) => Promise<void>;
  private onNetworkRetry?: LLMClientOptions['onNetworkRetry'];

  constructor(backend: TextGenerationBackend, options: LLMClientOptions) {
    this.backend = backend;
    this.metrics = options.metrics;
    this.networkRetries = Math.max(0, options.networkRetries ?? DEFAULT_NETWORK_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.onNetworkRetry = options.onNetworkRetry;
  }

  async generate(prompt: string): Promise<string> {
    const maxCalls = this.networkRetries + 1;
    let lastError: TransientNetworkError | undefined;

    for (let call = 1; call <= maxCalls; call++) {
      this.metrics.recordApiCall();

      try {
        return await this.backend.complete(prompt);
      } catch (error) {
        if (!(error instanceof TransientNetworkError)) {
          throw new LLMRequestError(`Generation request failed: ${describe(error)}`, call, { cause: error });
        }
        lastError = error;
      }

      if (call < maxCalls) {
        this.onNetworkRetry?.(lastError, call);
        await this.sleep(this.retryDelayMs);
      }
    }

    throw new LLMRequestError(
      `Generation request failed after ${maxCalls} attempts: ${describe(lastError)}`,
      maxCalls,
      { cause: lastError }
    );
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
