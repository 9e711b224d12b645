/**
 * Config schema validation
 */

import type { Config, ConfigDefaults } from '../types/index.js';
import { compileTemplate, TemplateSyntaxError } from '../template/index.js';
import { isOutputFormat } from '../table/index.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const ALIAS_PATTERN = /^[A-Za-z0-9_.-]+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkTemplates(value: unknown, errors: ValidationError[]): Record<string, string> {
  const templates: Record<string, string> = {};
  if (!isRecord(value)) {
    errors.push({ path: 'templates', message: 'templates must be an object' });
    return templates;
  }

  for (const [alias, template] of Object.entries(value)) {
    const path = `templates.${alias}`;
    if (!ALIAS_PATTERN.test(alias)) {
      errors.push({ path, message: 'template name may only contain letters, digits, "_", "." and "-"' });
      continue;
    }
    if (typeof template !== 'string' || !template) {
      errors.push({ path, message: 'template must be a non-empty string' });
      continue;
    }
    try {
      compileTemplate(template);
    } catch (e) {
      if (!(e instanceof TemplateSyntaxError)) throw e;
      errors.push({ path, message: e.message });
      continue;
    }
    templates[alias] = template;
  }
  return templates;
}

function checkDefaults(value: unknown, errors: ValidationError[]): ConfigDefaults {
  const defaults: ConfigDefaults = {};
  if (!isRecord(value)) {
    errors.push({ path: 'defaults', message: 'defaults must be an object' });
    return defaults;
  }

  if (value.format !== undefined) {
    if (isOutputFormat(value.format)) {
      defaults.format = value.format;
    } else {
      errors.push({ path: 'defaults.format', message: 'format must be one of: table, csv, json' });
    }
  }

  if (value.match !== undefined) {
    if (value.match === 'any' || value.match === 'all') {
      defaults.match = value.match;
    } else {
      errors.push({ path: 'defaults.match', message: 'match must be "any" or "all"' });
    }
  }

  if (value.cwd !== undefined) {
    if (typeof value.cwd === 'string' && value.cwd) {
      defaults.cwd = value.cwd;
    } else {
      errors.push({ path: 'defaults.cwd', message: 'cwd must be a non-empty string' });
    }
  }

  return defaults;
}

function checkConfig(value: unknown): { config: Config | null; errors: ValidationError[] } {
  if (!isRecord(value)) {
    return { config: null, errors: [{ path: '', message: 'config must be an object' }] };
  }

  const errors: ValidationError[] = [];

  if (value.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  const templates = checkTemplates(value.templates ?? {}, errors);
  const config: Config = { version: 1, templates };
  if (value.defaults !== undefined) {
    config.defaults = checkDefaults(value.defaults, errors);
  }

  return errors.length === 0 ? { config, errors } : { config: null, errors };
}

export function validateConfig(config: unknown): ValidationResult {
  const { errors } = checkConfig(config);
  return { valid: errors.length === 0, errors };
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ValidationError[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  return checkConfig(parsed);
}
