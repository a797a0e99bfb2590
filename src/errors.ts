export class RubricateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing credential or unreadable configuration. Fatal at startup. */
export class ConfigurationError extends RubricateError {}

/** Empty subject, topic or response. The caller should ask again. */
export class InputError extends RubricateError {
  constructor(
    message: string,
    readonly field: 'subject' | 'topic' | 'response'
  ) {
    super(message);
  }
}

/**
 * Raised by a backend for failures worth retrying: timeouts, dropped
 * connections, rate limits and 5xx responses.
 */
export class TransientNetworkError extends RubricateError {}

/** The generation service could not be reached, after any local retries. */
export class LLMRequestError extends RubricateError {
  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class SessionStateError extends RubricateError {}
