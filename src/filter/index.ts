/**
 * Row filter
 *
 * Public API for constraint parsing and evaluation.
 */

// Types
export type {
  AssignmentParseResult,
  ColumnSource,
  ConstraintParseResult,
  ConstraintValue,
  Constraints,
  FilterOptions,
  MatchMode,
  ParsedAssignment,
  ParsedConstraint,
} from './types.js';

// Column suggestions
export { suggestColumns } from './fields.js';

// Parser
export { parseAssignment, parseConstraint } from './parser.js';

// Evaluator
export { buildMask, matchesConstraint } from './evaluator.js';
