import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { loadConfig, type AssessorConfig } from '../../config/index.js';
import { ConfigurationError, InputError, LLMRequestError } from '../../errors.js';
import { saveAssessment, toStructured } from '../../export/index.js';
import { createMetrics } from '../../metrics/index.js';
import { createSession } from '../../session/index.js';
import { formatMetrics, formatQuestion, formatResults } from '../display.js';
import { formatError, icons, Spinner, style, BANNER_MINIMAL } from '../theme.js';
import { parseInteger } from './options.js';

export interface AssessOptions {
  subject?: string;
  topic?: string;
  responseFile?: string;
  model?: string;
  maxTokens?: number;
  maxAttempts?: number;
  config?: string;
  output?: string;
  save?: boolean;
  json?: boolean;
  quiet?: boolean;
}

// Prompts go to stderr under --json so stdout stays a single JSON document.
async function prompter(json: boolean) {
  const { default: inquirer } = await import('inquirer');
  return json ? inquirer.createPromptModule({ output: process.stderr }) : inquirer.prompt;
}

async function askText(message: string, emptyMessage: string, json: boolean): Promise<string> {
  const prompt = await prompter(json);
  const { value } = await prompt<{ value: string }>([{
    type: 'input',
    name: 'value',
    message,
    validate: (input: string) => (input.trim() ? true : emptyMessage),
  }]);
  return value.trim();
}

/**
 * Appends one typed line to a multi-line answer. A blank line right after
 * another blank line ends the answer; returns true once it has.
 */
export function pushAnswerLine(lines: string[], line: string): boolean {
  if (line === '' && lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
    return true;
  }
  lines.push(line);
  return false;
}

async function askAnswer(json: boolean, print: (text: string) => void): Promise<string> {
  const prompt = await prompter(json);
  print(style.dim('Type your answer. Press Enter twice to finish.'));

  for (;;) {
    const lines: string[] = [];
    let finished = false;
    while (!finished) {
      const { line } = await prompt<{ line: string }>([{ type: 'input', name: 'line', message: '>', prefix: '' }]);
      finished = pushAnswerLine(lines, line);
    }

    const answer = lines.join('\n').trim();
    if (answer) {
      return answer;
    }
    print(style.warning('Response cannot be empty. Please try again.'));
  }
}

async function askToSave(): Promise<boolean> {
  const prompt = await prompter(false);
  const { save } = await prompt<{ save: boolean }>([{
    type: 'confirm',
    name: 'save',
    message: 'Save results to file?',
    default: false,
  }]);
  return save;
}

/**
 * Where the generated question goes. A student about to be prompted for an
 * answer always sees it, on stderr when stdout carries JSON.
 */
export function questionPrinter(
  options: Pick<AssessOptions, 'responseFile' | 'json' | 'quiet'>
): (text: string) => void {
  if (options.responseFile) {
    return options.quiet || options.json ? () => {} : console.log;
  }
  return options.json ? console.error : console.log;
}

function suggestionsFor(error: unknown): string[] {
  if (error instanceof ConfigurationError) {
    return [
      'Export your key: ANTHROPIC_API_KEY=<your key>',
      `Check the file passed with ${style.command('--config')} (or rubricate.yaml) is valid YAML`,
    ];
  }
  if (error instanceof LLMRequestError) {
    return [
      'Check your network connection',
      'Ensure ANTHROPIC_API_KEY is valid and has remaining quota',
      `Try another model with ${style.command('--model')}`,
    ];
  }
  if (error instanceof InputError) {
    return [`Pass a non-empty value with ${style.command(`--${error.field === 'response' ? 'response-file' : error.field}`)}`];
  }
  return ['Please check your setup and try again.'];
}

export async function runAssessment(options: AssessOptions): Promise<void> {
  const config: AssessorConfig = loadConfig({
    configPath: options.config,
    overrides: {
      model: options.model,
      maxTokens: options.maxTokens,
      maxAttempts: options.maxAttempts,
      outputDir: options.output,
    },
  });
  const quiet = Boolean(options.quiet || options.json);
  const log = quiet ? () => {} : console.log;

  log(`\n${icons.rocket} ${BANNER_MINIMAL}`);
  log(style.dim(`   model ${config.model}, up to ${config.maxAttempts} attempts per step\n`));

  const metrics = createMetrics();
  let spinner: Spinner | undefined;
  let fallbackUsed = false;

  const session = createSession(config, {
    metrics,
    onNetworkRetry: (error, retryNumber) => {
      spinner?.update(
        `${style.warning('API error:')} ${error.message} ${style.dim(`(retry ${retryNumber} in ${config.retryDelayMs / 1000}s)`)}`
      );
    },
    onRetry: (failedAttempt) => {
      spinner?.update(
        `JSON validation failed ${style.dim(`(attempt ${failedAttempt}/${config.maxAttempts})`)}, retrying with error feedback...`
      );
    },
    onFallback: () => {
      fallbackUsed = true;
    },
  });

  const runStep = async <T>(text: string, done: string, step: () => Promise<T>): Promise<T> => {
    const current = new Spinner(text, { silent: quiet });
    spinner = current;
    fallbackUsed = false;
    current.start();
    try {
      const result = await step();
      if (fallbackUsed) {
        current.warn(`${done} ${style.warning('(using fallback content after validation failures)')}`);
      } else {
        current.succeed(done);
      }
      return result;
    } catch (error) {
      current.fail();
      throw error;
    } finally {
      spinner = undefined;
    }
  };

  const json = Boolean(options.json);
  const subject = options.subject ?? await askText('Enter the subject area:', 'Subject cannot be empty.', json);
  const topic = options.topic ?? await askText('Enter the specific topic:', 'Topic cannot be empty.', json);

  const questionRubric = await runStep(
    `${icons.note} Generating question and rubric...`,
    'Question and rubric generated',
    () => session.start(subject, topic)
  );

  const printQuestion = questionPrinter(options);
  printQuestion(formatQuestion(questionRubric));

  const response = options.responseFile
    ? await readFile(options.responseFile, 'utf-8')
    : await askAnswer(json, printQuestion);

  const record = await runStep(
    `${icons.magnify} Scoring response...`,
    'Scoring complete',
    () => session.submitResponse(response)
  );

  if (options.json) {
    console.log(toStructured(record));
  } else {
    log(formatResults(record));
    log(formatMetrics(metrics.summary(), metrics.counts()));
  }

  const shouldSave = options.save ?? (!json && Boolean(process.stdin.isTTY) && await askToSave());
  if (shouldSave) {
    const saved = await saveAssessment(record, config.outputDir);
    log(`\n${style.success(icons.success)} Results saved to ${style.path(saved.jsonPath)}`);
    log(`${style.success(icons.success)} Human-readable results saved to ${style.path(saved.textPath)}`);
  }

  log(`\n${icons.sparkle} Assessment complete.`);
}

export const assessCommand = new Command('assess')
  .description('Generate a question and rubric, collect an answer and grade it')
  .option('-s, --subject <subject>', 'Subject area (prompted when omitted)')
  .option('-t, --topic <topic>', 'Specific topic (prompted when omitted)')
  .option('-r, --response-file <path>', 'Read the student response from a file instead of prompting')
  .option('-m, --model <model>', 'Anthropic model to use')
  .option('--max-tokens <n>', 'Maximum tokens per model response', parseInteger(1))
  .option('--max-attempts <n>', 'Validation attempts per step before falling back', parseInteger(1))
  .option('-c, --config <path>', 'YAML config file (defaults to ./rubricate.yaml when present)')
  .option('-o, --output <dir>', 'Directory for saved results')
  .option('--save', 'Save results without asking')
  .option('--no-save', 'Do not save results')
  .option('--json', 'Print the assessment record as JSON only')
  .option('-q, --quiet', 'Suppress progress output')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('rubricate assess')}                                          ${style.dim('Fully interactive')}
  ${style.command('rubricate assess -s Biology -t Photosynthesis')}             ${style.dim('Prompt only for the answer')}
  ${style.command('rubricate assess -s Biology -t Photosynthesis -r answer.txt --save')}
`)
  .action(async (options: AssessOptions) => {
    try {
      await runAssessment(options);
    } catch (error) {
      console.error(formatError(
        error instanceof Error ? error.message : String(error),
        suggestionsFor(error)
      ));
      process.exit(1);
    }
  });
