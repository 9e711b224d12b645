/**
 * Command-line assignment parser
 *
 * Grammar:
 *   assignment = name '=' value
 *   constraint = name '=' value ( ',' value )*
 *
 * Values are kept as text; callers coerce them with the column's type.
 */

import type { AssignmentParseResult, ConstraintParseResult } from './types.js';

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parse `name=value` (used by --set)
 */
export function parseAssignment(input: string): AssignmentParseResult {
  const eq = input.indexOf('=');
  if (eq === -1) {
    return { ok: false, error: `Expected name=value, got "${input}"` };
  }

  const name = input.slice(0, eq).trim();
  if (!NAME_PATTERN.test(name)) {
    return { ok: false, error: `Invalid name "${name}"`, position: 0 };
  }

  const value = input.slice(eq + 1);
  if (value === '') {
    return { ok: false, error: `Missing value for "${name}"`, position: eq + 1 };
  }

  return { ok: true, assignment: { name, value } };
}

/**
 * Parse `column=value` or `column=v1,v2` (used by --where)
 */
export function parseConstraint(input: string): ConstraintParseResult {
  const result = parseAssignment(input);
  if (!result.ok) {
    return result;
  }

  const { name, value } = result.assignment;
  const values = value.split(',');
  const empty = values.findIndex((v) => v === '');
  if (empty !== -1) {
    return { ok: false, error: `Empty value in list for "${name}"`, position: input.indexOf('=') + 1 };
  }

  return { ok: true, constraint: { column: name, values } };
}
