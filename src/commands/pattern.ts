/**
 * Pattern command - show the glob pattern a template resolves to
 *
 * pathgrid pattern <template> [values...] [--set name=value] [--steps]
 *
 * Does not touch the filesystem.
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { compileTemplate } from '../template/index.js';
import { createBindings, describeBindings, resolveSearchPattern, type ResolveState } from '../resolver/index.js';
import { output, fail } from '../utils/output.js';
import { collectBindings } from './shared.js';

interface PatternCommandOptions {
  set?: string[];
  steps?: boolean;
}

export function createPatternCommand(getConfigPath: () => string): Command {
  return new Command('pattern')
    .description('Show the glob pattern a naming template resolves to')
    .argument('<template>', 'Naming template, or @name of a template stored in config')
    .argument('[values...]', 'Placeholder values, in order of appearance')
    .option('-s, --set <name=value...>', 'Bind a placeholder by name')
    .option('--steps', 'Show every intermediate pattern')
    .action(async (templateRef: string, values: string[], options: PatternCommandOptions) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const template = await manager.resolveTemplate(templateRef);
        const compiled = compileTemplate(template);
        const { positional, named } = collectBindings(compiled, values, options.set);

        const steps: ResolveState[] = [];
        const resolved = resolveSearchPattern(template, createBindings(compiled, positional, named), {
          onStep: (state) => steps.push(state),
        });

        const lines: string[] = [];
        if (options.steps) {
          for (const step of steps) {
            lines.push(`#${step.retries}  ${step.pattern}`);
          }
          lines.push('');
        }
        lines.push(resolved.pattern);
        if (resolved.wildcarded.length > 0) {
          lines.push(`wildcards: ${resolved.wildcarded.join(', ')}`);
        }

        output(
          {
            template,
            pattern: resolved.pattern,
            wildcarded: resolved.wildcarded,
            bindings: describeBindings(resolved.bindings),
            steps: steps.map((s) => s.pattern),
          },
          lines.join('\n')
        );
      } catch (error) {
        fail('Failed to resolve pattern', error);
      }
    });
}
