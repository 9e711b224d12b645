/**
 * Fields command - list the placeholders of a naming template
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { compileTemplate, FIELD_TYPE_NAMES } from '../template/index.js';
import { output, fail } from '../utils/output.js';

export function createFieldsCommand(getConfigPath: () => string): Command {
  return new Command('fields')
    .description('List the placeholders of a naming template')
    .argument('<template>', 'Naming template, or @name of a template stored in config')
    .action(async (templateRef: string) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const compiled = compileTemplate(await manager.resolveTemplate(templateRef));

        const fields = compiled.names.map((name) => {
          const occurrences = compiled.fields.filter((f) => f.name === name);
          const spec = occurrences[0].spec;
          return {
            name,
            type: FIELD_TYPE_NAMES[spec.type],
            spec: spec.raw,
            occurrences: occurrences.length,
          };
        });

        const width = Math.max(4, ...fields.map((f) => f.name.length));
        const lines = fields.map(
          (f) => `${f.name.padEnd(width)}  ${f.type.padEnd(7)}  ${f.spec ? `{${f.name}:${f.spec}}` : `{${f.name}}`}`
        );

        output(fields, lines.length > 0 ? lines.join('\n') : '(no placeholders)');
      } catch (error) {
        fail('Failed to read template', error);
      }
    });
}
