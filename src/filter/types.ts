/**
 * Row filter types
 *
 * Constraints map a column name to a value (equality) or a list of values
 * (membership):  { run: 1, parameter: [10, 20] }
 */

import type { FieldValue } from '../template/index.js';

/** A scalar means equality; a list means membership */
export type ConstraintValue = FieldValue | readonly FieldValue[];

export type Constraints = Readonly<Record<string, ConstraintValue>>;

/**
 * How per-constraint results combine for a row.
 * - any: row kept if it satisfies at least one constraint (OR)
 * - all: row kept only if it satisfies every constraint (AND)
 */
export type MatchMode = 'any' | 'all';

export interface FilterOptions {
  /** Default: 'any' */
  match?: MatchMode;
}

/** Anything exposing its columns as value sequences */
export interface ColumnSource {
  readonly length: number;
  column(name: string): readonly (FieldValue | undefined)[];
}

/** `column=value` or `column=v1,v2` as typed on the command line */
export interface ParsedConstraint {
  column: string;
  values: string[];
}

export interface ParsedAssignment {
  name: string;
  value: string;
}

export type AssignmentParseResult =
  | { ok: true; assignment: ParsedAssignment }
  | { ok: false; error: string; position?: number };

export type ConstraintParseResult =
  | { ok: true; constraint: ParsedConstraint }
  | { ok: false; error: string; position?: number };
