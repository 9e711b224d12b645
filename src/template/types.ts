/**
 * Naming template types
 *
 * A naming template mixes literal text with named placeholders:
 *   `data/run{run:d}_p{parameter:03d}.csv`
 *
 * `{{` and `}}` stand for literal braces.
 */

/** Type code of a placeholder (`s` when omitted) */
export type FieldTypeCode = 's' | 'w' | 'd' | 'f';

/** Parsed `[0][width][.precision][type]` format spec */
export interface FormatSpec {
  /** Spec text as written after the colon ('' when absent) */
  raw: string;
  type: FieldTypeCode;
  zeroPad: boolean;
  width?: number;
  precision?: number;
}

/** A placeholder occurrence in the template */
export interface TemplateField {
  name: string;
  spec: FormatSpec;
  /** Offset of the opening brace in the template */
  position: number;
}

export type TemplateToken =
  | { kind: 'literal'; text: string }
  | { kind: 'field'; field: TemplateField };

/** Values recovered from a path */
export type FieldValue = string | number;

/** Marker for a placeholder that should match anything */
export const WILDCARD: unique symbol = Symbol('pathgrid.wildcard');
export type Wildcard = typeof WILDCARD;

export type BindingValue = FieldValue | Wildcard;

/** name → bound value. Never mutated; each step builds a new map. */
export type Bindings = ReadonlyMap<string, BindingValue>;

export type RenderResult =
  | { ok: true; text: string }
  | { ok: false; missing: string };

export type TemplateParseResult =
  | { ok: true; named: Record<string, FieldValue> }
  | { ok: false; error: string };

export interface CompiledTemplate {
  readonly source: string;
  readonly tokens: readonly TemplateToken[];
  /** Every placeholder occurrence, in template order */
  readonly fields: readonly TemplateField[];
  /** Distinct placeholder names in order of first appearance */
  readonly names: readonly string[];
  render(bindings: Bindings): RenderResult;
  parse(candidate: string): TemplateParseResult;
}

/** Readable names of the type codes */
export const FIELD_TYPE_NAMES: Record<FieldTypeCode, string> = {
  s: 'string',
  w: 'word',
  d: 'integer',
  f: 'float',
};
