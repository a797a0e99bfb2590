import { describe, it, expect } from 'vitest';
import { AssessmentSession } from './assessment-session.js';
import { createSession } from './factory.js';
import { ValidatedGenerator } from '../generator/validated-generator.js';
import { LLMClient } from '../llm/client.js';
import { MetricsCollector } from '../metrics/collector.js';
import { ASSESSMENT_RECORD_SCHEMA, getDocumentSchema } from '../schemas/registry.js';
import { validateDocument } from '../schemas/validator.js';
import { InputError, LLMRequestError, SessionStateError } from '../errors.js';
import type { AssessorConfig } from '../config/index.js';
import { ScriptedBackend, type ScriptStep } from '../testing/scripted-backend.js';
import { STUDENT_RESPONSE, VALID_QUESTION, VALID_SCORE, fenced } from '../testing/fixtures.js';

const NOW = new Date('2026-03-01T10:00:00.000Z');

function setup(steps: ScriptStep[]) {
  const metrics = new MetricsCollector();
  const backend = new ScriptedBackend(steps);
  const client = new LLMClient(backend, { metrics, retryDelayMs: 0, networkRetries: 0 });
  const generator = new ValidatedGenerator(client, { metrics });
  const session = new AssessmentSession(generator, { now: () => NOW });
  return { metrics, backend, session };
}

describe('AssessmentSession', () => {
  it('runs from subject and topic to a complete record', async () => {
    const { session, backend, metrics } = setup([JSON.stringify(VALID_QUESTION), fenced(VALID_SCORE)]);
    expect(session.state).toBe('awaiting-subject-topic');

    const questionRubric = await session.start('  Biology ', 'Photosynthesis');

    expect(questionRubric).toEqual({ subject: 'Biology', topic: 'Photosynthesis', ...VALID_QUESTION });
    expect(session.state).toBe('awaiting-response');
    expect(session.questionRubric).toBe(questionRubric);

    const record = await session.submitResponse(`\n${STUDENT_RESPONSE}\n\n`);

    expect(record).toEqual({
      subject: 'Biology',
      topic: 'Photosynthesis',
      question: VALID_QUESTION.question,
      rubric: VALID_QUESTION.rubric,
      student_response: STUDENT_RESPONSE,
      score: VALID_SCORE,
      metadata: {
        version: '2.0',
        json_validated: true,
        timestamp: '2026-03-01T10:00:00.000Z',
      },
    });
    expect(session.state).toBe('complete');
    expect(session.record).toBe(record);
    expect(backend.prompts[1]).toContain(`Student Response: ${STUDENT_RESPONSE}`);
    expect(metrics.counts()).toMatchObject({ apiCallCount: 2, firstAttemptSuccessCount: 2 });
  });

  it('freezes the finished record', async () => {
    const { session } = setup([JSON.stringify(VALID_QUESTION), JSON.stringify(VALID_SCORE)]);
    await session.start('Biology', 'Photosynthesis');
    const record = await session.submitResponse(STUDENT_RESPONSE);

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.score)).toBe(true);
    expect(Object.isFrozen(record.rubric.poor)).toBe(true);
  });

  it('rejects an empty subject without calling the model', async () => {
    const { session, backend } = setup([]);

    const error = await session.start('   ', 'Photosynthesis').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InputError);
    if (error instanceof InputError) {
      expect(error.field).toBe('subject');
    }
    expect(session.state).toBe('awaiting-subject-topic');
    expect(backend.prompts).toEqual([]);
  });

  it('rejects an empty topic', async () => {
    const { session } = setup([]);
    await expect(session.start('Biology', '')).rejects.toThrow('Topic cannot be empty.');
  });

  it('keeps waiting for a response after an empty one', async () => {
    const { session } = setup([JSON.stringify(VALID_QUESTION), JSON.stringify(VALID_SCORE)]);
    await session.start('Biology', 'Photosynthesis');

    await expect(session.submitResponse(' \n ')).rejects.toBeInstanceOf(InputError);
    expect(session.state).toBe('awaiting-response');

    await expect(session.submitResponse(STUDENT_RESPONSE)).resolves.toMatchObject({ score: VALID_SCORE });
  });

  it('enforces the order of steps', async () => {
    const { session } = setup([JSON.stringify(VALID_QUESTION)]);

    await expect(session.submitResponse(STUDENT_RESPONSE)).rejects.toBeInstanceOf(SessionStateError);

    await session.start('Biology', 'Photosynthesis');
    await expect(session.start('Biology', 'Photosynthesis')).rejects.toBeInstanceOf(SessionStateError);
  });

  it('marks the record when scoring fell back to the default document', async () => {
    const { session } = setup([JSON.stringify(VALID_QUESTION), 'nope', 'nope', 'nope']);
    await session.start('Biology', 'Photosynthesis');

    const record = await session.submitResponse(STUDENT_RESPONSE);

    expect(record.score).toEqual(getDocumentSchema('score_result').fallback());
    expect(record.metadata.json_validated).toBe(false);
    expect(session.outcomes.score?.usedFallback).toBe(true);
    expect(session.outcomes.question?.usedFallback).toBe(false);
  });

  it('marks the record when the question fell back to the default document', async () => {
    const { session } = setup(['{}', '{}', '{}', JSON.stringify(VALID_SCORE)]);

    const questionRubric = await session.start('Biology', 'Photosynthesis');
    const record = await session.submitResponse(STUDENT_RESPONSE);

    expect(questionRubric.question).toBe('Explain the key concepts of Photosynthesis in Biology and provide an example.');
    expect(record.metadata.json_validated).toBe(false);
  });

  it('produces a renderable record when a very long topic falls back', async () => {
    const topic = 'Photosynthesis '.repeat(35).trim();
    const { session } = setup(['{}', '{}', '{}', JSON.stringify(VALID_SCORE)]);

    await session.start('Biology', topic);
    const record = await session.submitResponse(STUDENT_RESPONSE);

    expect(record.topic).toBe(topic);
    expect(validateDocument(record, ASSESSMENT_RECORD_SCHEMA).valid).toBe(true);
  });

  it('aborts on a request failure and keeps no record', async () => {
    const { session } = setup([new Error('service unavailable')]);

    await expect(session.start('Biology', 'Photosynthesis')).rejects.toBeInstanceOf(LLMRequestError);
    expect(session.state).toBe('aborted');
    expect(session.record).toBeUndefined();
    await expect(session.start('Biology', 'Photosynthesis')).rejects.toBeInstanceOf(SessionStateError);
  });

  it('aborts when scoring cannot reach the service', async () => {
    const { session } = setup([JSON.stringify(VALID_QUESTION), new Error('service unavailable')]);
    await session.start('Biology', 'Photosynthesis');

    await expect(session.submitResponse(STUDENT_RESPONSE)).rejects.toBeInstanceOf(LLMRequestError);
    expect(session.state).toBe('aborted');
    expect(session.record).toBeUndefined();
  });
});

describe('createSession', () => {
  const config: AssessorConfig = {
    apiKey: 'test-key',
    model: 'test-model',
    maxTokens: 256,
    maxAttempts: 2,
    networkRetries: 0,
    retryDelayMs: 0,
    outputDir: 'unused',
  };

  it('wires the configured attempt limit and metrics through to the generator', async () => {
    const metrics = new MetricsCollector();
    const backend = new ScriptedBackend([JSON.stringify(VALID_QUESTION), 'bad', 'bad']);
    const session = createSession(config, { metrics, backend, now: () => NOW });

    await session.start('Biology', 'Photosynthesis');
    const record = await session.submitResponse(STUDENT_RESPONSE);

    expect(record.metadata.json_validated).toBe(false);
    expect(metrics.counts()).toEqual({
      apiCallCount: 3,
      validationSuccessCount: 1,
      firstAttemptSuccessCount: 1,
      retryCount: 1,
      fallbackCount: 1,
    });
  });
});
