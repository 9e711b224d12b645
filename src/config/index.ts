/**
 * Config module
 */

export { ConfigManager, ALIAS_PREFIX } from './manager.js';
export { parseConfig, validateConfig } from './schema.js';
export type { ValidationError, ValidationResult } from './schema.js';
export { locateConfig, userConfigDir, CONFIG_ENV_VAR, CONFIG_FILE_NAME, CONFIG_SOURCE_LABELS } from './location.js';
export type { ConfigLocation, ConfigSource, LocateOptions, PlatformContext } from './location.js';
