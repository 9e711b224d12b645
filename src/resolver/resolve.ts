/**
 * Search pattern resolution
 *
 * Turns a naming template plus a partial binding set into a glob pattern.
 * Each step renders the current pattern; when a placeholder has no value,
 * the step returns a new pattern with that placeholder's spec dropped and a
 * new binding set with the placeholder bound to WILDCARD. Steps never mutate
 * their input, so each intermediate state can be inspected on its own.
 *
 * Literal text is escaped for the glob; bound values are substituted as is.
 */

import {
  WILDCARD,
  renderTokens,
  serializeTemplate,
  tokenizeTemplate,
  type BindingValue,
  type Bindings,
  type FormatSpec,
  type TemplateToken,
} from '../template/index.js';
import { escapeGlobLiteral } from '../discovery/index.js';

/** Spec given to a wildcarded placeholder: plain string */
const PLAIN_SPEC: FormatSpec = { raw: '', type: 's', zeroPad: false };

/** The shortest placeholder, `{p}`, is three characters long */
const MIN_PLACEHOLDER_LENGTH = 3;

export class UnresolvableTemplateError extends Error {
  constructor(
    public readonly template: string,
    public readonly pattern: string,
    public readonly retries: number
  ) {
    super(`Cannot resolve "${template}" after ${retries} retries (last pattern: "${pattern}")`);
    this.name = 'UnresolvableTemplateError';
  }
}

export interface ResolveState {
  /** Template text, with wildcarded placeholders reduced to `{name}` */
  readonly pattern: string;
  readonly bindings: Bindings;
  /** Number of placeholders wildcarded so far */
  readonly retries: number;
}

export type ResolveStepResult =
  | { done: true; pattern: string; state: ResolveState }
  | { done: false; wildcarded: string; state: ResolveState };

export interface ResolveOptions {
  /** Defaults to floor(template.length / 3) */
  maxRetries?: number;
  /** Called with the state about to be rendered, once per attempt */
  onStep?: (state: ResolveState) => void;
}

export interface ResolvedPattern {
  /** Glob pattern with every placeholder substituted */
  pattern: string;
  bindings: Bindings;
  /** Placeholders that were bound to WILDCARD, in the order found */
  wildcarded: string[];
  retries: number;
}

/**
 * Upper bound on the number of placeholders a template can hold
 */
export function maxRetriesFor(template: string): number {
  return Math.floor(template.length / MIN_PLACEHOLDER_LENGTH);
}

export function initialState(template: string, bindings: Bindings): ResolveState {
  return { pattern: template, bindings, retries: 0 };
}

/**
 * Attempt a full substitution of the current pattern
 * @throws TemplateSyntaxError, BindingError
 */
export function resolveStep(state: ResolveState): ResolveStepResult {
  const tokens = tokenizeTemplate(state.pattern);
  const rendered = renderTokens(tokens, state.bindings, escapeGlobLiteral);
  if (rendered.ok) {
    return { done: true, pattern: rendered.text, state };
  }

  const name = rendered.missing;
  const rewritten = tokens.map((token): TemplateToken =>
    token.kind === 'field' && token.field.name === name
      ? { kind: 'field', field: { ...token.field, spec: PLAIN_SPEC } }
      : token
  );
  const bindings = new Map<string, BindingValue>(state.bindings);
  bindings.set(name, WILDCARD);

  return {
    done: false,
    wildcarded: name,
    state: {
      pattern: serializeTemplate(rewritten),
      bindings,
      retries: state.retries + 1,
    },
  };
}

/**
 * Resolve a template into a glob pattern, wildcarding unbound placeholders
 * @throws UnresolvableTemplateError when the retry cap is exceeded
 */
export function resolveSearchPattern(
  template: string,
  bindings: Bindings,
  options: ResolveOptions = {}
): ResolvedPattern {
  const maxRetries = options.maxRetries ?? maxRetriesFor(template);
  const wildcarded: string[] = [];
  let state = initialState(template, bindings);

  for (;;) {
    options.onStep?.(state);
    const step = resolveStep(state);
    if (step.done) {
      return {
        pattern: step.pattern,
        bindings: step.state.bindings,
        wildcarded,
        retries: step.state.retries,
      };
    }
    if (step.state.retries > maxRetries) {
      throw new UnresolvableTemplateError(template, step.state.pattern, maxRetries);
    }
    wildcarded.push(step.wildcarded);
    state = step.state;
  }
}
