/**
 * Table builder - discovers files by naming template and tabulates the
 * values encoded in their names.
 *
 * Pipeline:
 *   template + bindings → glob pattern → sorted paths → parsed records → table
 *
 * Everything is synchronous: one enumeration, then one parse per path.
 */

import { TemplateSyntaxError, compileTemplate, type FieldValue } from '../template/index.js';
import { createBindings, describeBindings, resolveSearchPattern } from '../resolver/index.js';
import { comparePaths, createFsEnumerator, type PathEnumerator } from '../discovery/index.js';
import { ParamTable, PATH_COLUMN, type Row } from '../table/index.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface BuildOptions {
  /** Values for placeholders in order of first appearance */
  positional?: readonly FieldValue[];
  /** Values for placeholders by name */
  named?: Readonly<Record<string, FieldValue>>;
  /** Log every resolution step and a summary of the matches */
  debug?: boolean;
  /** Base directory for relative templates */
  cwd?: string;
  /** Override filesystem enumeration */
  enumerate?: PathEnumerator;
  logger?: Logger;
  /** Override the resolution retry cap */
  maxRetries?: number;
}

/**
 * Human summary of what the pattern matched
 */
export function describeMatches(paths: readonly string[]): string {
  const n = paths.length;
  if (n > 1) return `${n} matches, e.g., "${paths[0]}"`;
  if (n === 1) return `1 match, i.e., "${paths[0]}"`;
  return 'No match; please check the naming template';
}

/**
 * Build a parameter table from the files matching a naming template.
 *
 * Unbound placeholders become `*` in the search pattern. Each match is then
 * parsed against the original template, with its type specs; paths that do
 * not parse are logged and skipped.
 *
 * @throws TemplateSyntaxError, BindingError, UnresolvableTemplateError
 *
 * @example
 *   buildParamTable('data/run{run:d}_p{parameter:d}.csv')
 *   // path               run  parameter
 *   // data/run1_p10.csv  1    10
 *   // data/run2_p20.csv  2    20
 */
export function buildParamTable(template: string, options: BuildOptions = {}): ParamTable {
  const debug = options.debug ?? false;
  const logger = options.logger ?? createLogger(undefined, debug ? 'debug' : 'info');
  const enumerate = options.enumerate ?? createFsEnumerator({ cwd: options.cwd });

  const compiled = compileTemplate(template);
  const reserved = compiled.fields.find((field) => field.name === PATH_COLUMN);
  if (reserved) {
    throw new TemplateSyntaxError(`Placeholder name "${PATH_COLUMN}" is reserved`, template, reserved.position);
  }
  const columns = [PATH_COLUMN, ...compiled.names];
  const bindings = createBindings(compiled, options.positional, options.named);

  const resolved = resolveSearchPattern(template, bindings, {
    maxRetries: options.maxRetries,
    onStep: debug
      ? (state) =>
          logger.debug({
            event: 'resolve_step',
            attempt: state.retries,
            pattern: state.pattern,
            bindings: describeBindings(state.bindings),
          })
      : undefined,
  });

  const paths = [...enumerate(resolved.pattern)].sort(comparePaths);

  if (debug) {
    logger.debug({
      event: 'pattern_resolved',
      template,
      pattern: resolved.pattern,
      wildcarded: resolved.wildcarded,
    });
    logger.debug({
      event: paths.length > 0 ? 'matches' : 'no_match',
      pattern: resolved.pattern,
      count: paths.length,
      message: describeMatches(paths),
    });
  }

  const records: Row[] = [];
  for (const path of paths) {
    const result = compiled.parse(path);
    if (!result.ok) {
      logger.warn({ event: 'parse_failed', path, template, message: `Failed to parse "${path}"` });
      continue;
    }
    records.push({ ...result.named, [PATH_COLUMN]: path });
  }

  return ParamTable.fromRecords(columns, records);
}
