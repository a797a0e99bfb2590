import { InputError, SessionStateError } from '../errors.js';
import type { ValidatedGenerator } from '../generator/validated-generator.js';
import { buildQuestionPrompt, buildScoringPrompt } from '../generator/prompt-builder.js';
import { getDocumentSchema, SCHEMA_VERSION } from '../schemas/registry.js';
import type { AssessmentRecord, QuestionRubric } from '../schemas/types.js';
import type { SessionOptions, SessionOutcomes, SessionState } from './types.js';

/**
 * One assessment run:
 *
 *   awaiting-subject-topic → generating-question → awaiting-response → scoring → complete
 *
 * A request failure while generating moves the session to `aborted` and is
 * rethrown. There are no backward transitions.
 */
export class AssessmentSession {
  private generator: ValidatedGenerator;
  private maxAttempts?: number;
  private now: () => Date;
  private currentState: SessionState = 'awaiting-subject-topic';
  private currentQuestion?: QuestionRubric;
  private finalRecord?: AssessmentRecord;
  private generationOutcomes: SessionOutcomes = {};

  constructor(generator: ValidatedGenerator, options: SessionOptions = {}) {
    this.generator = generator;
    this.maxAttempts = options.maxAttempts;
    this.now = options.now ?? (() => new Date());
  }

  get state(): SessionState {
    return this.currentState;
  }

  get questionRubric(): QuestionRubric | undefined {
    return this.currentQuestion;
  }

  get record(): AssessmentRecord | undefined {
    return this.finalRecord;
  }

  get outcomes(): Readonly<SessionOutcomes> {
    return this.generationOutcomes;
  }

  async start(subject: string, topic: string): Promise<QuestionRubric> {
    this.expectState('awaiting-subject-topic', 'start');

    const cleanSubject = subject.trim();
    const cleanTopic = topic.trim();
    if (!cleanSubject) {
      throw new InputError('Subject cannot be empty.', 'subject');
    }
    if (!cleanTopic) {
      throw new InputError('Topic cannot be empty.', 'topic');
    }

    this.currentState = 'generating-question';
    const outcome = await this.guard(() =>
      this.generator.generateValidated(
        buildQuestionPrompt(cleanSubject, cleanTopic),
        getDocumentSchema('question_rubric'),
        { maxAttempts: this.maxAttempts, context: { subject: cleanSubject, topic: cleanTopic } }
      )
    );

    this.generationOutcomes.question = outcome;
    this.currentQuestion = {
      subject: cleanSubject,
      topic: cleanTopic,
      question: outcome.document.question,
      rubric: outcome.document.rubric,
    };
    this.currentState = 'awaiting-response';
    return this.currentQuestion;
  }

  async submitResponse(response: string): Promise<AssessmentRecord> {
    this.expectState('awaiting-response', 'submitResponse');
    const questionRubric = this.currentQuestion;
    const questionOutcome = this.generationOutcomes.question;
    if (!questionRubric || !questionOutcome) {
      throw new SessionStateError('No question has been generated for this session');
    }

    const studentResponse = response.trim();
    if (!studentResponse) {
      throw new InputError('Response cannot be empty.', 'response');
    }

    this.currentState = 'scoring';
    const outcome = await this.guard(() =>
      this.generator.generateValidated(
        buildScoringPrompt(questionRubric, studentResponse),
        getDocumentSchema('score_result'),
        { maxAttempts: this.maxAttempts }
      )
    );
    this.generationOutcomes.score = outcome;

    const record: AssessmentRecord = {
      subject: questionRubric.subject,
      topic: questionRubric.topic,
      question: questionRubric.question,
      rubric: questionRubric.rubric,
      student_response: studentResponse,
      score: outcome.document,
      metadata: {
        version: SCHEMA_VERSION,
        json_validated: !questionOutcome.usedFallback && !outcome.usedFallback,
        timestamp: this.now().toISOString(),
      },
    };

    this.finalRecord = deepFreeze(record);
    this.currentState = 'complete';
    return this.finalRecord;
  }

  private expectState(expected: SessionState, operation: string): void {
    if (this.currentState !== expected) {
      throw new SessionStateError(
        `Cannot ${operation} while session is ${this.currentState} (expected ${expected})`
      );
    }
  }

  private async guard<T>(step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      this.currentState = 'aborted';
      throw error;
    }
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}
