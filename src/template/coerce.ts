/**
 * Convert command-line text into the value a placeholder expects
 */

import type { FieldValue, TemplateField } from './types.js';
import { BindingError } from './errors.js';

const INTEGER_TEXT = /^[-+]?\d+$/;
const FLOAT_TEXT = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Coerce raw text to the scalar type of a field
 * @throws BindingError when the text is not a valid value for the field
 */
export function coerceFieldValue(field: Pick<TemplateField, 'name' | 'spec'>, raw: string): FieldValue {
  const text = raw.trim();
  switch (field.spec.type) {
    case 'd': {
      if (!INTEGER_TEXT.test(text)) {
        throw new BindingError(`Field "${field.name}" expects an integer, got "${raw}"`, field.name);
      }
      const n = Number.parseInt(text, 10);
      if (!Number.isSafeInteger(n)) {
        throw new BindingError(`Field "${field.name}" value "${raw}" is out of the safe integer range`, field.name);
      }
      return n;
    }
    case 'f':
      if (!FLOAT_TEXT.test(text)) {
        throw new BindingError(`Field "${field.name}" expects a number, got "${raw}"`, field.name);
      }
      return Number.parseFloat(text);
    default:
      return raw;
  }
}
