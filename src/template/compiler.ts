/**
 * Naming template compiler
 *
 * Grammar:
 *   template    = ( literal | '{{' | '}}' | placeholder )*
 *   placeholder = '{' name ( ':' spec )? '}'
 *   name        = [A-Za-z_][A-Za-z0-9_]*
 *   spec        = '0'? width? ( '.' precision )? type?
 *   type        = 's' | 'w' | 'd' | 'f'
 *
 * A compiled template renders bindings into text (used to build the glob
 * pattern) and parses text back into typed field values.
 */

import {
  WILDCARD,
  type Bindings,
  type CompiledTemplate,
  type FieldTypeCode,
  type FieldValue,
  type FormatSpec,
  type RenderResult,
  type TemplateField,
  type TemplateParseResult,
  type TemplateToken,
} from './types.js';
import { BindingError, TemplateSyntaxError } from './errors.js';

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SPEC_PATTERN = /^(0)?(\d+)?(?:\.(\d+))?([swdf])?$/;
const WORD_PATTERN = /^\w+$/;

/** Regex fragment each field type matches when parsing */
const FIELD_PATTERNS: Record<FieldTypeCode, string> = {
  s: '[\\s\\S]+?',
  w: '\\w+',
  d: ' *[-+]?\\d+',
  f: ' *[-+]?\\d*\\.\\d+',
};

// ============================================================
// Tokenizer
// ============================================================

/**
 * Split a template into literal and placeholder tokens
 * @throws TemplateSyntaxError on unbalanced braces, bad names or specs
 */
export function tokenizeTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let literal = '';
  let pos = 0;

  const flush = () => {
    if (literal) {
      tokens.push({ kind: 'literal', text: literal });
      literal = '';
    }
  };

  while (pos < template.length) {
    const ch = template[pos];

    if (ch === '{') {
      if (template[pos + 1] === '{') {
        literal += '{';
        pos += 2;
        continue;
      }
      const close = template.indexOf('}', pos + 1);
      if (close === -1) {
        throw new TemplateSyntaxError('Unterminated placeholder', template, pos);
      }
      const body = template.slice(pos + 1, close);
      if (body.includes('{')) {
        throw new TemplateSyntaxError('Nested placeholder', template, pos);
      }
      flush();
      tokens.push({ kind: 'field', field: parseFieldBody(body, template, pos) });
      pos = close + 1;
      continue;
    }

    if (ch === '}') {
      if (template[pos + 1] === '}') {
        literal += '}';
        pos += 2;
        continue;
      }
      throw new TemplateSyntaxError("Single '}' encountered", template, pos);
    }

    literal += ch;
    pos++;
  }

  flush();
  checkRepeatedFields(tokens, template);
  return tokens;
}

function parseFieldBody(body: string, template: string, position: number): TemplateField {
  const colon = body.indexOf(':');
  const name = colon === -1 ? body : body.slice(0, colon);
  const rawSpec = colon === -1 ? '' : body.slice(colon + 1);

  if (!name) {
    throw new TemplateSyntaxError('Placeholders must be named', template, position);
  }
  if (!NAME_PATTERN.test(name)) {
    throw new TemplateSyntaxError(`Invalid placeholder name "${name}"`, template, position);
  }

  return { name, spec: parseFormatSpec(rawSpec, template, position), position };
}

/**
 * Parse the part of a placeholder after the colon
 */
export function parseFormatSpec(raw: string, template: string, position: number): FormatSpec {
  const m = SPEC_PATTERN.exec(raw);
  if (!m) {
    throw new TemplateSyntaxError(`Unsupported format spec "${raw}"`, template, position);
  }

  const type = toTypeCode(m[4]);
  const precision = m[3] !== undefined ? Number(m[3]) : undefined;
  if (precision !== undefined && (type === 'd' || type === 'w')) {
    throw new TemplateSyntaxError(`Precision not allowed for type "${type}"`, template, position);
  }

  return {
    raw,
    type,
    zeroPad: m[1] === '0',
    width: m[2] !== undefined ? Number(m[2]) : undefined,
    precision,
  };
}

function toTypeCode(code: string | undefined): FieldTypeCode {
  switch (code) {
    case 'w':
    case 'd':
    case 'f':
      return code;
    default:
      return 's';
  }
}

function checkRepeatedFields(tokens: TemplateToken[], template: string): void {
  const seen = new Map<string, FormatSpec>();
  for (const token of tokens) {
    if (token.kind !== 'field') continue;
    const { name, spec, position } = token.field;
    const first = seen.get(name);
    if (first === undefined) {
      seen.set(name, spec);
    } else if (first.raw !== spec.raw) {
      throw new TemplateSyntaxError(`Repeated placeholder "${name}" with a different format`, template, position);
    }
  }
}

/**
 * Turn tokens back into template text (inverse of tokenizeTemplate)
 */
export function serializeTemplate(tokens: readonly TemplateToken[]): string {
  return tokens
    .map((token) => {
      if (token.kind === 'literal') {
        return token.text.replace(/\{/g, '{{').replace(/\}/g, '}}');
      }
      const { name, spec } = token.field;
      return spec.raw ? `{${name}:${spec.raw}}` : `{${name}}`;
    })
    .join('');
}

// ============================================================
// Rendering
// ============================================================

/**
 * Substitute bindings into the template.
 * Stops at the first placeholder without a binding.
 *
 * @param literal Applied to literal text only, e.g. to escape it for a glob
 */
export function renderTokens(
  tokens: readonly TemplateToken[],
  bindings: Bindings,
  literal: (text: string) => string = (text) => text
): RenderResult {
  let text = '';
  for (const token of tokens) {
    if (token.kind === 'literal') {
      text += literal(token.text);
      continue;
    }
    const { name, spec } = token.field;
    const value = bindings.get(name);
    if (value === undefined) {
      return { ok: false, missing: name };
    }
    text += value === WILDCARD ? '*' : formatValue(value, spec, name);
  }
  return { ok: true, text };
}

/**
 * Format a value according to a placeholder spec
 * @throws BindingError when the value does not fit the spec type
 */
export function formatValue(value: FieldValue, spec: FormatSpec, name: string): string {
  switch (spec.type) {
    case 'd':
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
        throw new BindingError(`Field "${name}" expects an integer, got ${JSON.stringify(value)}`, name);
      }
      return padNumber(String(Math.abs(value)), value < 0 ? '-' : '', spec);
    case 'f':
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new BindingError(`Field "${name}" expects a number, got ${JSON.stringify(value)}`, name);
      }
      return padNumber(Math.abs(value).toFixed(spec.precision ?? 6), value < 0 ? '-' : '', spec);
    case 'w': {
      const text = String(value);
      if (!WORD_PATTERN.test(text)) {
        throw new BindingError(`Field "${name}" expects word characters, got ${JSON.stringify(value)}`, name);
      }
      return text.padEnd(spec.width ?? 0);
    }
    case 's': {
      const text = String(value);
      const cut = spec.precision !== undefined ? text.slice(0, spec.precision) : text;
      return cut.padEnd(spec.width ?? 0);
    }
  }
}

function padNumber(digits: string, sign: string, spec: FormatSpec): string {
  const width = spec.width ?? 0;
  if (spec.zeroPad) {
    return sign + digits.padStart(width - sign.length, '0');
  }
  return (sign + digits).padStart(width);
}

// ============================================================
// Parsing
// ============================================================

interface Capture {
  name: string;
  group: string;
  type: FieldTypeCode;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build an anchored matcher. Repeated names become backreferences,
 * so every occurrence must capture the same text.
 */
function buildMatcher(tokens: readonly TemplateToken[]): { regex: RegExp; captures: Capture[] } {
  const captures: Capture[] = [];
  const groups = new Map<string, string>();
  let source = '^';

  for (const token of tokens) {
    if (token.kind === 'literal') {
      source += escapeRegExp(token.text);
      continue;
    }
    const { name, spec } = token.field;
    const existing = groups.get(name);
    if (existing !== undefined) {
      source += `\\k<${existing}>`;
      continue;
    }
    const group = `f${groups.size}`;
    groups.set(name, group);
    captures.push({ name, group, type: spec.type });
    source += `(?<${group}>${FIELD_PATTERNS[spec.type]})`;
  }

  return { regex: new RegExp(source + '$'), captures };
}

/** null when an integer cannot be represented exactly */
function convert(text: string, type: FieldTypeCode): FieldValue | null {
  switch (type) {
    case 'd': {
      const n = Number.parseInt(text.trim(), 10);
      return Number.isSafeInteger(n) ? n : null;
    }
    case 'f':
      return Number.parseFloat(text.trim());
    default:
      return text;
  }
}

// ============================================================
// Compile
// ============================================================

/**
 * Compile a naming template
 * @throws TemplateSyntaxError
 */
export function compileTemplate(source: string): CompiledTemplate {
  const tokens = tokenizeTemplate(source);
  const fields: TemplateField[] = [];
  for (const token of tokens) {
    if (token.kind === 'field') fields.push(token.field);
  }
  const names = [...new Set(fields.map((f) => f.name))];
  const { regex, captures } = buildMatcher(tokens);

  return {
    source,
    tokens,
    fields,
    names,
    render: (bindings) => renderTokens(tokens, bindings),
    parse(candidate: string): TemplateParseResult {
      const m = regex.exec(candidate);
      if (!m) {
        return { ok: false, error: `"${candidate}" does not match "${source}"` };
      }
      const groups = m.groups ?? {};
      const named: Record<string, FieldValue> = {};
      for (const { name, group, type } of captures) {
        const text = groups[group];
        if (text === undefined) {
          return { ok: false, error: `Field "${name}" missing in "${candidate}"` };
        }
        const value = convert(text, type);
        if (value === null) {
          return { ok: false, error: `Field "${name}" value "${text.trim()}" is out of the safe integer range` };
        }
        named[name] = value;
      }
      return { ok: true, named };
    },
  };
}
