/**
 * Row filter evaluator
 *
 * Builds a boolean mask over a column source. Unknown columns fail before
 * any row is read.
 */

import type { FieldValue } from '../template/index.js';
import type { ColumnSource, ConstraintValue, Constraints, MatchMode } from './types.js';

/**
 * Check a single cell against a constraint
 */
export function matchesConstraint(value: FieldValue | undefined, constraint: ConstraintValue): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof constraint === 'object') {
    return constraint.includes(value);
  }
  return value === constraint;
}

/**
 * Evaluate constraints for every row
 * @returns One boolean per row, in row order
 * @throws UnknownColumnError (from the source) for a column it does not have
 */
export function buildMask(source: ColumnSource, constraints: Constraints, match: MatchMode = 'any'): boolean[] {
  const checks = Object.entries(constraints).map(([column, constraint]) => ({
    values: source.column(column),
    constraint,
  }));

  const mask: boolean[] = [];
  for (let i = 0; i < source.length; i++) {
    const test = (check: { values: readonly (FieldValue | undefined)[]; constraint: ConstraintValue }) =>
      matchesConstraint(check.values[i], check.constraint);
    // No constraints: 'any' keeps nothing, 'all' keeps everything
    mask.push(match === 'all' ? checks.every(test) : checks.some(test));
  }
  return mask;
}
