import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { formatPercent, suggestedFilename, toReadable, toStructured } from './exporter.js';
import { saveAssessment } from './writer.js';
import { ASSESSMENT_RECORD_SCHEMA } from '../schemas/registry.js';
import { validateDocument } from '../schemas/validator.js';
import { STUDENT_RESPONSE, VALID_QUESTION, VALID_SCORE, sampleRecord } from '../testing/fixtures.js';

describe('toStructured', () => {
  it('produces the same text for the same record', () => {
    const record = sampleRecord();
    expect(toStructured(record)).toBe(toStructured(sampleRecord()));
  });

  it('keeps the record field order', () => {
    const parsed: unknown = JSON.parse(toStructured(sampleRecord()));
    expect(typeof parsed === 'object' && parsed !== null ? Object.keys(parsed) : []).toEqual([
      'subject',
      'topic',
      'question',
      'rubric',
      'student_response',
      'score',
      'metadata',
    ]);
  });

  it('parses back into a valid record', () => {
    const result = validateDocument(JSON.parse(toStructured(sampleRecord())), ASSESSMENT_RECORD_SCHEMA);
    expect(result).toEqual({ valid: true, value: sampleRecord() });
  });

  it('indents with two spaces', () => {
    expect(toStructured(sampleRecord()).split('\n')[1]).toBe('  "subject": "Biology",');
  });
});

describe('formatPercent', () => {
  it('formats a ratio as a one-decimal percentage', () => {
    expect(formatPercent(0.85)).toBe('85.0%');
    expect(formatPercent(1)).toBe('100.0%');
    expect(formatPercent(0)).toBe('0.0%');
    expect(formatPercent(0.123)).toBe('12.3%');
  });
});

describe('toReadable', () => {
  it('lays out every section of the record', () => {
    const expected = [
      'ASSESSMENT RESULTS',
      '='.repeat(60),
      '',
      'Subject: Biology',
      'Topic: Photosynthesis',
      '',
      `Question: ${VALID_QUESTION.question}`,
      '',
      'Rubric:',
      '  POOR',
      `    Criteria: ${VALID_QUESTION.rubric.poor.criteria}`,
      `    Example: ${VALID_QUESTION.rubric.poor.example}`,
      '  ADEQUATE',
      `    Criteria: ${VALID_QUESTION.rubric.adequate.criteria}`,
      `    Example: ${VALID_QUESTION.rubric.adequate.example}`,
      '  EXCELLENT',
      `    Criteria: ${VALID_QUESTION.rubric.excellent.criteria}`,
      `    Example: ${VALID_QUESTION.rubric.excellent.example}`,
      '',
      'Student Response:',
      STUDENT_RESPONSE,
      '',
      'Score: EXCELLENT',
      'Confidence: 85.0%',
      '',
      'Rationale:',
      VALID_SCORE.rationale,
      '',
      'JSON Validated: yes',
      'Version: 2.0',
      'Timestamp: 2026-03-01T10:00:00.000Z',
      '',
    ].join('\n');

    expect(toReadable(sampleRecord())).toBe(expected);
  });

  it('notes when fallback content was used', () => {
    const record = sampleRecord({
      metadata: { version: '2.0', json_validated: false, timestamp: '2026-03-01T10:00:00.000Z' },
    });
    expect(toReadable(record)).toContain('\nJSON Validated: no (fallback used)\n');
  });
});

describe('suggestedFilename', () => {
  it('lowercases and replaces spaces', () => {
    expect(suggestedFilename({ subject: 'Biology', topic: 'Cell Division' })).toBe('assessment_biology_cell_division');
  });

  it('replaces characters that are unsafe in file names', () => {
    expect(suggestedFilename({ subject: 'Computer Science', topic: 'Big O/Notation' })).toBe(
      'assessment_computer_science_big_o_notation'
    );
  });

  it('keeps dots and dashes', () => {
    expect(suggestedFilename({ subject: 'Math', topic: 'Sets-1.2' })).toBe('assessment_math_sets-1.2');
  });
});

describe('saveAssessment', () => {
  let outputDir: string | undefined;

  afterEach(async () => {
    if (outputDir) {
      await rm(outputDir, { recursive: true, force: true });
      outputDir = undefined;
    }
  });

  it('writes both renderings into a created directory', async () => {
    const root = await mkdtemp(join(tmpdir(), 'assessments-'));
    outputDir = root;
    const target = join(root, 'nested');
    const record = sampleRecord();

    const saved = await saveAssessment(record, target);

    expect(saved).toEqual({
      jsonPath: join(target, 'assessment_biology_photosynthesis.json'),
      textPath: join(target, 'assessment_biology_photosynthesis.txt'),
    });
    expect(await readFile(saved.jsonPath, 'utf-8')).toBe(toStructured(record) + '\n');
    expect(await readFile(saved.textPath, 'utf-8')).toBe(toReadable(record));
  });
});
