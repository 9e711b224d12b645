/**
 * Scan command
 *
 * pathgrid scan <template> [values...] [--set name=value] [--where col=v1,v2]
 *
 * Finds files matching the template, parses their names and prints one row
 * per file. Unbound placeholders match anything.
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { buildParamTable } from '../builder/index.js';
import { compileTemplate } from '../template/index.js';
import { renderTable } from '../table/index.js';
import { output, fail } from '../utils/output.js';
import { collectBindings, collectConstraints, parseMatchMode, parseOutputFormat } from './shared.js';

interface ScanCommandOptions {
  set?: string[];
  where?: string[];
  match?: string;
  format?: string;
  cwd?: string;
  debug?: boolean;
}

export function createScanCommand(getConfigPath: () => string): Command {
  return new Command('scan')
    .description('Find files matching a naming template and tabulate their fields')
    .argument('<template>', 'Naming template, or @name of a template stored in config')
    .argument('[values...]', 'Placeholder values, in order of appearance')
    .option('-s, --set <name=value...>', 'Bind a placeholder by name')
    .option('-w, --where <column=values...>', 'Keep rows where column equals a value (comma-separated for a list)')
    .option('-m, --match <mode>', 'Combine --where constraints: any (OR) or all (AND)')
    .option('-f, --format <format>', 'Output format: table, csv or json')
    .option('-C, --cwd <dir>', 'Directory relative templates are resolved against')
    .option('-d, --debug', 'Log resolution steps and matches to stderr')
    .addHelpText('after', `
Examples:
  pathgrid scan 'data/run{run:d}_p{parameter:d}.csv'
  pathgrid scan 'data/run{run:d}_p{parameter:d}.csv' 1
  pathgrid scan 'data/run{run:d}_p{parameter:d}.csv' --set parameter=20
  pathgrid scan @runs --where run=1,2 --format csv
`)
    .action(async (templateRef: string, values: string[], options: ScanCommandOptions) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const config = await manager.loadOrDefault();
        const defaults = config.defaults ?? {};
        const template = await manager.resolveTemplate(templateRef);

        const format = parseOutputFormat(options.format, defaults.format ?? 'table');
        const match = parseMatchMode(options.match, defaults.match ?? 'any');

        const compiled = compileTemplate(template);
        const { positional, named } = collectBindings(compiled, values, options.set);
        const constraints = collectConstraints(compiled, options.where);

        let table = buildParamTable(template, {
          positional,
          named,
          debug: options.debug,
          cwd: options.cwd ?? defaults.cwd,
        });

        if (options.where && options.where.length > 0) {
          table = table.filter(constraints, { match });
        }

        output(table.toJSON(), renderTable(table, format));
      } catch (error) {
        fail('Scan failed', error);
      }
    });
}
