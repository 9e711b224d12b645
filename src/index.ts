/**
 * pathgrid
 * Programmatic API exports
 */

// Templates
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
} from './template/index.js';
export {
  WILDCARD,
  FIELD_TYPE_NAMES,
  TemplateSyntaxError,
  BindingError,
  compileTemplate,
  tokenizeTemplate,
  serializeTemplate,
  coerceFieldValue,
} from './template/index.js';

// Pattern resolution
export type { ResolveState, ResolveStepResult, ResolveOptions, ResolvedPattern } from './resolver/index.js';
export {
  UnresolvableTemplateError,
  createBindings,
  describeBindings,
  initialState,
  maxRetriesFor,
  resolveStep,
  resolveSearchPattern,
} from './resolver/index.js';

// Discovery
export type { PathEnumerator, EnumerateOptions } from './discovery/index.js';
export { enumeratePaths, createFsEnumerator, comparePaths, escapeGlobLiteral } from './discovery/index.js';

// Tables
export type { Row, OutputFormat } from './table/index.js';
export {
  ParamTable,
  RecordFrame,
  UnknownColumnError,
  PATH_COLUMN,
  renderText,
  renderCsv,
  renderJson,
  renderTable,
} from './table/index.js';

// Filtering
export type { Constraints, ConstraintValue, FilterOptions, MatchMode } from './filter/index.js';
export { buildMask, matchesConstraint, parseConstraint, parseAssignment } from './filter/index.js';

// Builder
export type { BuildOptions } from './builder/index.js';
export { buildParamTable, describeMatches } from './builder/index.js';

// Config
export type { Config, ConfigDefaults } from './types/index.js';
export { DEFAULT_CONFIG } from './types/index.js';
export { ConfigManager, parseConfig, validateConfig } from './config/index.js';
export { locateConfig, userConfigDir } from './config/index.js';
export type { ConfigLocation, ConfigSource } from './config/index.js';

// Logging
export type { Logger, LogEntry, LogLevel } from './utils/logger.js';
export { createLogger } from './utils/logger.js';
