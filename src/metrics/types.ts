export interface MetricsCounts {
  apiCallCount: number;
  validationSuccessCount: number;
  firstAttemptSuccessCount: number;
  retryCount: number;
  fallbackCount: number;
}

export interface MetricsSummary {
  apiCallCount: number;
  validationSuccessRate: number;
  firstAttemptSuccessRate: number;
  fallbackRate: number;
}

/** The slice of the collector the adapter and generator write to. */
export interface MetricsSink {
  recordApiCall(): void;
  recordValidationSuccess(firstAttempt: boolean): void;
  recordRetry(): void;
  recordFallback(): void;
}
