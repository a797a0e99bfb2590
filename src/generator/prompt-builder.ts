import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describeSchema } from '../schemas/registry.js';
import type { QuestionRubric } from '../schemas/types.js';
import type { AttemptFailure } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = join(__dirname, '../../prompts');

const promptCache = new Map<string, string>();

function loadPrompt(name: string): string {
  const cached = promptCache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  const content = readFileSync(join(PROMPTS_DIR, `${name}.md`), 'utf-8').trimEnd();
  promptCache.set(name, content);
  return content;
}

/** Values go in literally; `$&` and friends in a student's answer are not patterns. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (placeholder, key: string) =>
    Object.hasOwn(values, key) ? values[key] : placeholder
  );
}

export function buildSystemPrompt(): string {
  return loadPrompt('system');
}

export function buildQuestionPrompt(subject: string, topic: string): string {
  return fillTemplate(loadPrompt('question-rubric'), {
    SUBJECT: subject,
    TOPIC: topic,
    SCHEMA: describeSchema('question_rubric'),
  });
}

export function buildScoringPrompt(questionRubric: QuestionRubric, response: string): string {
  const { rubric } = questionRubric;
  return fillTemplate(loadPrompt('scoring'), {
    QUESTION: questionRubric.question,
    POOR_CRITERIA: rubric.poor.criteria,
    ADEQUATE_CRITERIA: rubric.adequate.criteria,
    EXCELLENT_CRITERIA: rubric.excellent.criteria,
    RESPONSE: response,
    SCHEMA: describeSchema('score_result'),
  });
}

export function formatFailures(failures: AttemptFailure[]): string {
  return failures
    .map(f => [`Attempt ${f.attempt}:`, ...f.errors.map(e => `- ${e}`)].join('\n'))
    .join('\n');
}

export function buildFeedbackPrompt(basePrompt: string, failures: AttemptFailure[]): string {
  const feedback = fillTemplate(loadPrompt('retry-feedback'), {
    ERRORS: formatFailures(failures),
  });
  return `${basePrompt}\n\n${feedback}`;
}
