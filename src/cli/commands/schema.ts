import { Command } from 'commander';
import { DOCUMENT_KINDS, describeSchema, isDocumentKind } from '../../schemas/index.js';
import { formatError, style, subheader } from '../theme.js';

export const schemaCommand = new Command('schema')
  .description('Show the JSON Schema the model must satisfy')
  .argument('[kind]', `Document kind (${DOCUMENT_KINDS.join(', ')})`)
  .action((kind: string | undefined) => {
    if (kind !== undefined && !isDocumentKind(kind)) {
      console.error(formatError(
        `Unknown document kind: ${style.highlight(kind)}`,
        [`Use one of: ${DOCUMENT_KINDS.join(', ')}`]
      ));
      process.exit(1);
    }

    const kinds = kind === undefined ? DOCUMENT_KINDS : [kind];
    for (const k of kinds) {
      console.log(subheader(k));
      console.log(describeSchema(k));
    }
  });
