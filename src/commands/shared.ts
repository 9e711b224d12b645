/**
 * Helpers shared by commands that take a template plus values
 */

import {
  BindingError,
  coerceFieldValue,
  type CompiledTemplate,
  type FieldValue,
  type TemplateField,
} from '../template/index.js';
import { parseAssignment, parseConstraint, type ConstraintValue, type MatchMode } from '../filter/index.js';
import { isOutputFormat, type OutputFormat } from '../table/index.js';

export interface CommandBindings {
  positional: FieldValue[];
  named: Record<string, FieldValue>;
}

function findField(template: CompiledTemplate, name: string): TemplateField | undefined {
  return template.fields.find((f) => f.name === name);
}

function coerce(template: CompiledTemplate, name: string | undefined, raw: string): FieldValue {
  const field = name === undefined ? undefined : findField(template, name);
  return field ? coerceFieldValue(field, raw) : raw;
}

/**
 * Turn positional arguments and --set assignments into typed bindings
 * @throws BindingError
 */
export function collectBindings(
  template: CompiledTemplate,
  values: readonly string[] = [],
  assignments: readonly string[] = []
): CommandBindings {
  const positional = values.map((raw, i) => coerce(template, template.names[i], raw));

  const named: Record<string, FieldValue> = {};
  for (const input of assignments) {
    const result = parseAssignment(input);
    if (!result.ok) {
      throw new BindingError(`--set ${input}: ${result.error}`);
    }
    const { name, value } = result.assignment;
    if (Object.hasOwn(named, name)) {
      throw new BindingError(`Placeholder "${name}" is set more than once`, name);
    }
    named[name] = coerce(template, name, value);
  }

  return { positional, named };
}

/**
 * Turn --where inputs into filter constraints, typed by the template
 * @throws BindingError
 */
export function collectConstraints(
  template: CompiledTemplate,
  inputs: readonly string[] = []
): Record<string, ConstraintValue> {
  const constraints: Record<string, ConstraintValue> = {};
  for (const input of inputs) {
    const result = parseConstraint(input);
    if (!result.ok) {
      throw new BindingError(`--where ${input}: ${result.error}`);
    }
    const { column, values } = result.constraint;
    const typed = values.map((raw) => coerce(template, column, raw));
    constraints[column] = typed.length === 1 ? typed[0] : typed;
  }
  return constraints;
}

export function parseMatchMode(value: string | undefined, fallback: MatchMode): MatchMode {
  if (value === undefined) return fallback;
  if (value === 'any' || value === 'all') return value;
  throw new Error(`Invalid --match "${value}" (expected any or all)`);
}

export function parseOutputFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  if (value === undefined) return fallback;
  if (isOutputFormat(value)) return value;
  throw new Error(`Invalid --format "${value}" (expected table, csv or json)`);
}
