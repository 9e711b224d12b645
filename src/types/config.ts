/**
 * Configuration types for pathgrid
 */

import type { MatchMode } from '../filter/index.js';
import type { OutputFormat } from '../table/index.js';

export interface ConfigDefaults {
  /** Output format for `scan` (default: table) */
  format?: OutputFormat;
  /** How --where constraints combine (default: any) */
  match?: MatchMode;
  /** Base directory for relative templates */
  cwd?: string;
}

export interface Config {
  version: 1;
  /** Named templates, referenced on the command line as `@name` */
  templates: Record<string, string>;
  defaults?: ConfigDefaults;
}

export const DEFAULT_CONFIG: Config = {
  version: 1,
  templates: {},
};
