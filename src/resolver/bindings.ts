/**
 * Binding set construction
 *
 * Positional values fill distinct placeholder names in order of first
 * appearance; named values bind by name.
 */

import { BindingError, WILDCARD, type BindingValue, type Bindings, type CompiledTemplate, type FieldValue } from '../template/index.js';

export function createBindings(
  template: Pick<CompiledTemplate, 'names' | 'source'>,
  positional: readonly FieldValue[] = [],
  named: Readonly<Record<string, FieldValue>> = {}
): Bindings {
  if (positional.length > template.names.length) {
    throw new BindingError(
      `Got ${positional.length} positional values but "${template.source}" has ${template.names.length} placeholders`
    );
  }

  const bindings = new Map<string, BindingValue>();
  positional.forEach((value, i) => {
    bindings.set(template.names[i], value);
  });

  for (const [name, value] of Object.entries(named)) {
    if (!template.names.includes(name)) {
      throw new BindingError(`Unknown placeholder "${name}" in "${template.source}"`, name);
    }
    if (bindings.has(name)) {
      throw new BindingError(`Placeholder "${name}" is bound both by position and by name`, name);
    }
    bindings.set(name, value);
  }

  return bindings;
}

/**
 * Plain-object view of bindings for logs and JSON output
 */
export function describeBindings(bindings: Bindings): Record<string, FieldValue> {
  const out: Record<string, FieldValue> = {};
  for (const [name, value] of bindings) {
    out[name] = value === WILDCARD ? '*' : value;
  }
  return out;
}
