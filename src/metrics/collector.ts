import type { MetricsCounts, MetricsSink, MetricsSummary } from './types.js';

export class MetricsCollector implements MetricsSink {
  private apiCalls = 0;
  private validationSuccesses = 0;
  private firstAttemptSuccesses = 0;
  private retries = 0;
  private fallbacks = 0;

  recordApiCall(): void {
    this.apiCalls++;
  }

  recordValidationSuccess(firstAttempt: boolean): void {
    this.validationSuccesses++;
    if (firstAttempt) {
      this.firstAttemptSuccesses++;
    }
  }

  recordRetry(): void {
    this.retries++;
  }

  recordFallback(): void {
    this.fallbacks++;
  }

  /** Finished validated generations: each ends in either a success or a fallback. */
  get generationCount(): number {
    return this.validationSuccesses + this.fallbacks;
  }

  counts(): MetricsCounts {
    return {
      apiCallCount: this.apiCalls,
      validationSuccessCount: this.validationSuccesses,
      firstAttemptSuccessCount: this.firstAttemptSuccesses,
      retryCount: this.retries,
      fallbackCount: this.fallbacks,
    };
  }

  summary(): MetricsSummary {
    const total = this.generationCount;
    const rate = (count: number) => (total === 0 ? 0 : count / total);

    return {
      apiCallCount: this.apiCalls,
      validationSuccessRate: rate(this.validationSuccesses),
      firstAttemptSuccessRate: rate(this.firstAttemptSuccesses),
      fallbackRate: rate(this.fallbacks),
    };
  }
}

export function createMetrics(): MetricsCollector {
  return new MetricsCollector();
}
