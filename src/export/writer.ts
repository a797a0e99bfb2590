import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AssessmentRecord } from '../schemas/types.js';
import { suggestedFilename, toReadable, toStructured } from './exporter.js';

export interface SavedAssessment {
  jsonPath: string;
  textPath: string;
}

export async function saveAssessment(record: AssessmentRecord, outputDir: string): Promise<SavedAssessment> {
  await mkdir(outputDir, { recursive: true });

  const baseName = suggestedFilename(record);
  const jsonPath = join(outputDir, `${baseName}.json`);
  const textPath = join(outputDir, `${baseName}.txt`);

  await writeFile(jsonPath, toStructured(record) + '\n');
  await writeFile(textPath, toReadable(record));

  return { jsonPath, textPath };
}
