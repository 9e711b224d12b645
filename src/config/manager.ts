/**
 * Config manager - handles reading, writing, and modifying config
 */

import { Config, DEFAULT_CONFIG } from '../types/index.js';
import { locateConfig } from './location.js';
import { configFileExists, readConfigText, writeConfigText } from './file.js';
import { compileTemplate } from '../template/index.js';
import { parseConfig, validateConfig, ValidationResult } from './schema.js';

/** Prefix marking a template argument as a config alias */
export const ALIAS_PREFIX = '@';

export class ConfigManager {
  private configPath: string;
  private config: Config | null = null;
  /** Cache TTL in milliseconds (default: 5 seconds) */
  private cacheTtlMs: number;
  /** Timestamp when cache was last updated */
  private cacheUpdatedAt: number = 0;

  constructor(configPath?: string, options?: { cacheTtlMs?: number }) {
    this.configPath = locateConfig({ explicit: configPath }).path;
    this.cacheTtlMs = options?.cacheTtlMs ?? 5000;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async exists(): Promise<boolean> {
    return configFileExists(this.configPath);
  }

  async load(): Promise<Config> {
    // Return cached config if still valid
    const now = Date.now();
    if (this.config && (now - this.cacheUpdatedAt) < this.cacheTtlMs) {
      return this.config;
    }

    const content = await readConfigText(this.configPath);
    if (content === null) {
      throw new Error(`Config file not found: ${this.configPath}`);
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new Error(`Invalid config: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    this.config = config;
    this.cacheUpdatedAt = now;
    return config;
  }

  /**
   * Invalidate the config cache (force reload on next access)
   */
  invalidateCache(): void {
    this.cacheUpdatedAt = 0;
  }

  /**
   * Load the config, or the defaults when no config file exists.
   * An invalid config file still throws.
   */
  async loadOrDefault(): Promise<Config> {
    if (!(await this.exists())) {
      return { ...DEFAULT_CONFIG, templates: {} };
    }
    return this.load();
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new Error(`Invalid config: ${result.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    await writeConfigText(this.configPath, JSON.stringify(config, null, 2));
    this.config = config;
    this.cacheUpdatedAt = Date.now();
  }

  async init(force: boolean = false): Promise<{ created: boolean; path: string }> {
    const exists = await this.exists();
    if (exists && !force) {
      return { created: false, path: this.configPath };
    }

    await this.save({ ...DEFAULT_CONFIG, templates: {} });
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ValidationResult> {
    const content = await readConfigText(this.configPath);
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }

    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }

  // Template alias operations
  async getTemplates(): Promise<Record<string, string>> {
    const config = await this.loadOrDefault();
    return config.templates;
  }

  async setTemplate(name: string, template: string): Promise<void> {
    compileTemplate(template);
    const config = await this.loadOrDefault();
    await this.save({ ...config, templates: { ...config.templates, [name]: template } });
  }

  async removeTemplate(name: string): Promise<boolean> {
    const config = await this.loadOrDefault();
    if (!Object.hasOwn(config.templates, name)) {
      return false;
    }
    const templates = { ...config.templates };
    delete templates[name];
    await this.save({ ...config, templates });
    return true;
  }

  /**
   * Expand `@name` to the stored template; other input is returned as is
   */
  async resolveTemplate(ref: string): Promise<string> {
    if (!ref.startsWith(ALIAS_PREFIX)) {
      return ref;
    }
    const name = ref.slice(ALIAS_PREFIX.length);
    const templates = await this.getTemplates();
    const template = templates[name];
    if (template === undefined) {
      const known = Object.keys(templates);
      throw new Error(
        `Unknown template alias "${ref}"${known.length > 0 ? `; defined: ${known.map((k) => ALIAS_PREFIX + k).join(', ')}` : ''}`
      );
    }
    return template;
  }
}
