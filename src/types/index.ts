export type { Config, ConfigDefaults } from './config.js';
export { DEFAULT_CONFIG } from './config.js';
