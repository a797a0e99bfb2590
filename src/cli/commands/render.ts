import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { toReadable, toStructured } from '../../export/index.js';
import { ASSESSMENT_RECORD_SCHEMA, validateDocument } from '../../schemas/index.js';
import { formatError, style } from '../theme.js';

export const renderCommand = new Command('render')
  .description('Print a saved assessment record in human-readable form')
  .argument('<record>', 'Path to a saved assessment JSON file')
  .option('--json', 'Re-print the validated record as JSON instead', false)
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('rubricate render assessments/assessment_biology_photosynthesis.json')}
`)
  .action(async (recordPath: string, options: { json: boolean }) => {
    try {
      if (!existsSync(recordPath)) {
        console.error(formatError(
          `Record file not found: ${style.path(recordPath)}`,
          ['Check that the file path is correct']
        ));
        process.exit(1);
      }

      const data: unknown = JSON.parse(await readFile(recordPath, 'utf-8'));
      const result = validateDocument(data, ASSESSMENT_RECORD_SCHEMA);
      if (!result.valid) {
        console.error(formatError(
          `${style.path(recordPath)} is not a valid assessment record`,
          result.errors
        ));
        process.exit(1);
      }

      process.stdout.write(options.json ? toStructured(result.value) + '\n' : toReadable(result.value));
    } catch (error) {
      console.error(formatError(
        error instanceof Error ? error.message : String(error),
        ['Ensure the file is valid JSON written by rubricate assess --save']
      ));
      process.exit(1);
    }
  });
