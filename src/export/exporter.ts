import { SCORE_LEVELS, type AssessmentRecord } from '../schemas/types.js';

const RULE = '='.repeat(60);

export function toStructured(record: AssessmentRecord): string {
  return JSON.stringify(record, null, 2);
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function toReadable(record: AssessmentRecord): string {
  const lines: string[] = [];

  lines.push('ASSESSMENT RESULTS');
  lines.push(RULE);
  lines.push('');
  lines.push(`Subject: ${record.subject}`);
  lines.push(`Topic: ${record.topic}`);
  lines.push('');
  lines.push(`Question: ${record.question}`);
  lines.push('');
  lines.push('Rubric:');
  for (const level of SCORE_LEVELS) {
    const details = record.rubric[level];
    lines.push(`  ${level.toUpperCase()}`);
    lines.push(`    Criteria: ${details.criteria}`);
    lines.push(`    Example: ${details.example}`);
  }
  lines.push('');
  lines.push('Student Response:');
  lines.push(record.student_response);
  lines.push('');
  lines.push(`Score: ${record.score.score_level.toUpperCase()}`);
  lines.push(`Confidence: ${formatPercent(record.score.confidence)}`);
  lines.push('');
  lines.push('Rationale:');
  lines.push(record.score.rationale);
  lines.push('');
  lines.push(`JSON Validated: ${record.metadata.json_validated ? 'yes' : 'no (fallback used)'}`);
  lines.push(`Version: ${record.metadata.version}`);
  lines.push(`Timestamp: ${record.metadata.timestamp}`);

  return lines.join('\n') + '\n';
}

/** Base name without extension, e.g. `assessment_biology_photosynthesis`. */
export function suggestedFilename(record: Pick<AssessmentRecord, 'subject' | 'topic'>): string {
  return `assessment_${record.subject}_${record.topic}`
    .replace(/\s/g, '_')
    .replace(/[^\w.-]/g, '_')
    .toLowerCase();
}
