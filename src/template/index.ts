/**
 * Naming templates
 *
 * Public API for compiling, rendering and parsing naming templates.
 */

// Types
export type {
  BindingValue,
  Bindings,
  CompiledTemplate,
  FieldTypeCode,
  FieldValue,
  FormatSpec,
  RenderResult,
  TemplateField,
  TemplateParseResult,
  TemplateToken,
  Wildcard,
} from './types.js';
export { WILDCARD, FIELD_TYPE_NAMES } from './types.js';

// Errors
export { TemplateSyntaxError, BindingError } from './errors.js';

// Compiler
export {
  compileTemplate,
  tokenizeTemplate,
  serializeTemplate,
  renderTokens,
  formatValue,
  parseFormatSpec,
} from './compiler.js';

// Coercion
export { coerceFieldValue } from './coerce.js';
