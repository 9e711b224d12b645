/**
 * Pattern resolver
 */

export type { ResolveState, ResolveStepResult, ResolveOptions, ResolvedPattern } from './resolve.js';
export {
  UnresolvableTemplateError,
  initialState,
  maxRetriesFor,
  resolveStep,
  resolveSearchPattern,
} from './resolve.js';
export { createBindings, describeBindings } from './bindings.js';
