export type { SessionState, SessionOptions, SessionOutcomes } from './types.js';
export { AssessmentSession } from './assessment-session.js';
export { createSession, type SessionHooks, type CreateSessionOptions } from './factory.js';
