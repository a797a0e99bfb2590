export type { TextGenerationBackend, LLMClientOptions, AnthropicBackendOptions, MessagesApi } from './types.js';
export { LLMClient, DEFAULT_NETWORK_RETRIES, DEFAULT_RETRY_DELAY_MS } from './client.js';
export { AnthropicBackend, classifyAnthropicError, DEFAULT_MODEL, DEFAULT_MAX_TOKENS } from './anthropic-backend.js';
