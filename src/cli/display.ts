import { formatPercent } from '../export/exporter.js';
import type { MetricsCounts, MetricsSummary } from '../metrics/types.js';
import { SCORE_LEVELS, type AssessmentRecord, type QuestionRubric } from '../schemas/types.js';
import { header, icons, keyValue, scoreLevel, style, subheader } from './theme.js';

const EXAMPLE_PREVIEW_LENGTH = 100;

function preview(text: string, length = EXAMPLE_PREVIEW_LENGTH): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

export function formatQuestion(questionRubric: QuestionRubric): string {
  const lines: string[] = [];
  lines.push(header(`${icons.question} ASSESSMENT QUESTION`));
  lines.push(questionRubric.question);
  lines.push('');
  lines.push(style.dim('Please provide your answer in ~100 words.'));
  return lines.join('\n');
}

export function formatResults(record: AssessmentRecord): string {
  const lines: string[] = [];

  lines.push(header(`${icons.chart} ASSESSMENT RESULTS`));
  lines.push(keyValue(`${icons.book} Subject`, record.subject));
  lines.push(keyValue(`${icons.book} Topic`, record.topic));
  lines.push('');
  lines.push(keyValue(`${icons.question} Question`, record.question));

  lines.push(subheader(`${icons.rubric} Scoring Rubric`));
  for (const level of SCORE_LEVELS) {
    const details = record.rubric[level];
    lines.push(`  ${style.bold(level.toUpperCase())}`);
    lines.push(keyValue('Criteria', details.criteria, 2));
    lines.push(keyValue('Example', preview(details.example), 2));
  }

  lines.push(subheader(`${icons.answer} Student Response`));
  lines.push(`  ${record.student_response}`);
  lines.push('');

  lines.push(keyValue(`${icons.target} Score`, scoreLevel(record.score.score_level)));
  lines.push(keyValue(`${icons.chart} Confidence`, style.number(formatPercent(record.score.confidence))));
  lines.push(subheader(`${icons.note} Scoring Rationale`));
  lines.push(`  ${record.score.rationale}`);
  lines.push('');

  lines.push(
    record.metadata.json_validated
      ? `${style.success(icons.success)} JSON Validation: all responses validated successfully`
      : `${style.warning(icons.warning)} JSON Validation: fallback content was used for at least one step`
  );

  return lines.join('\n');
}

export function formatMetrics(summary: MetricsSummary, counts: MetricsCounts): string {
  const lines: string[] = [];
  lines.push(subheader(`${icons.chart} Operational Metrics`));
  lines.push(keyValue('Total API Calls', style.number(String(summary.apiCallCount)), 1));
  lines.push(keyValue('Validation Success Rate', style.number(formatPercent(summary.validationSuccessRate)), 1));
  lines.push(keyValue('First-Attempt Success Rate', style.number(formatPercent(summary.firstAttemptSuccessRate)), 1));
  lines.push(keyValue('Fallback Rate', style.number(formatPercent(summary.fallbackRate)), 1));
  lines.push(keyValue('Validation Retries', style.number(String(counts.retryCount)), 1));
  lines.push(keyValue('Fallback Responses Used', style.number(String(counts.fallbackCount)), 1));
  return lines.join('\n');
}
