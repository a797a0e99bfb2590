#!/usr/bin/env node

import { Command } from 'commander';
import { assessCommand } from './commands/assess.js';
import { renderCommand } from './commands/render.js';
import { schemaCommand } from './commands/schema.js';
import { BANNER_MINIMAL, style } from './theme.js';

const program = new Command();

program
  .name('rubricate')
  .description(`${BANNER_MINIMAL}\n\nGenerate an assessment question and rubric with Claude, then grade a free-text answer against it.`)
  .version('0.1.0')
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => style.command(cmd.name()) + ' ' + style.dim(cmd.usage()),
  })
  .addHelpText('afterAll', `
${style.bold('Examples:')}

  ${style.dim('# Run an interactive assessment')}
  $ rubricate

  ${style.dim('# Skip the subject and topic prompts and save the result')}
  $ rubricate assess -s Biology -t Photosynthesis --save

  ${style.dim('# Reprint a saved result')}
  $ rubricate render assessments/assessment_biology_photosynthesis.json

${style.muted('Requires ANTHROPIC_API_KEY in the environment.')}
`);

program.addCommand(assessCommand, { isDefault: true });
program.addCommand(renderCommand);
program.addCommand(schemaCommand);

await program.parseAsync(process.argv);
