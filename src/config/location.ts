/**
 * Where the config file lives
 *
 * Looked up in order:
 *   1. --config <path>
 *   2. PATHGRID_CONFIG
 *   3. the per-user config directory of the platform
 */

import { homedir } from 'os';
import { join } from 'path';

export const CONFIG_ENV_VAR = 'PATHGRID_CONFIG';
export const CONFIG_FILE_NAME = 'config.json';

const APP_DIR = 'pathgrid';

export type ConfigSource = 'flag' | 'env' | 'default';

export interface ConfigLocation {
  path: string;
  source: ConfigSource;
}

export interface PlatformContext {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  home?: string;
}

export interface LocateOptions extends PlatformContext {
  /** Value of --config */
  explicit?: string;
}

/** Human label for a config source */
export const CONFIG_SOURCE_LABELS: Record<ConfigSource, string> = {
  flag: '--config',
  env: CONFIG_ENV_VAR,
  default: 'default location',
};

/**
 * Per-user config directory:
 * `%APPDATA%\pathgrid`, `~/Library/Application Support/pathgrid`,
 * or `$XDG_CONFIG_HOME/pathgrid` (falling back to `~/.config/pathgrid`)
 */
export function userConfigDir(context: PlatformContext = {}): string {
  const env = context.env ?? process.env;
  const home = context.home ?? homedir();

  switch (context.platform ?? process.platform) {
    case 'win32':
      return join(env.APPDATA || join(home, 'AppData', 'Roaming'), APP_DIR);
    case 'darwin':
      return join(home, 'Library', 'Application Support', APP_DIR);
    default:
      return join(env.XDG_CONFIG_HOME || join(home, '.config'), APP_DIR);
  }
}

export function locateConfig(options: LocateOptions = {}): ConfigLocation {
  if (options.explicit) {
    return { path: options.explicit, source: 'flag' };
  }

  const fromEnv = (options.env ?? process.env)[CONFIG_ENV_VAR];
  if (fromEnv) {
    return { path: fromEnv, source: 'env' };
  }

  return { path: join(userConfigDir(options), CONFIG_FILE_NAME), source: 'default' };
}
