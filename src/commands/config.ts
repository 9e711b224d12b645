/**
 * Config commands
 */

import { Command } from 'commander';
import {
  ConfigManager,
  ALIAS_PREFIX,
  CONFIG_SOURCE_LABELS,
  type ConfigLocation,
  type ValidationResult,
} from '../config/index.js';
import { output, outputSuccess, fail } from '../utils/output.js';

export function createConfigCommand(locate: () => ConfigLocation): Command {
  const getConfigPath = () => locate().path;
  const cmd = new Command('config')
    .description('Manage pathgrid configuration');

  cmd
    .command('path')
    .description('Show the config file path')
    .action(() => {
      const location = locate();
      output(location, `${location.path}  (${CONFIG_SOURCE_LABELS[location.source]})`);
    });

  cmd
    .command('init')
    .description('Initialize a new config file')
    .option('-f, --force', 'Overwrite existing config')
    .option('-p, --path <path>', 'Custom config path')
    .action(async (options: { force?: boolean; path?: string }) => {
      try {
        const configPath = options.path || getConfigPath();
        const manager = new ConfigManager(configPath);
        const result = await manager.init(options.force);

        if (result.created) {
          outputSuccess(`Config created at: ${result.path}`);
        } else {
          output(
            { exists: true, path: result.path },
            `Config already exists at: ${result.path}\nUse --force to overwrite.`
          );
        }
      } catch (error) {
        fail('Failed to initialize config', error);
      }
    });

  cmd
    .command('show')
    .description('Show current config')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const config = await manager.load();

        output(config, JSON.stringify(config, null, 2));
      } catch (error) {
        fail('Failed to load config', error);
      }
    });

  cmd
    .command('validate')
    .description('Validate the config file')
    .action(async () => {
      let result: ValidationResult;
      try {
        result = await new ConfigManager(getConfigPath()).validate();
      } catch (error) {
        fail('Failed to validate config', error);
      }

      if (result.valid) {
        outputSuccess('Config is valid');
        return;
      }
      output(
        { valid: false, errors: result.errors },
        `Config validation failed:\n${result.errors.map(e => `  - ${e.path}: ${e.message}`).join('\n')}`
      );
      process.exit(1);
    });

  // ============================================================
  // config template - named templates usable as @name
  // ============================================================
  const template = cmd
    .command('template')
    .description(`Manage named templates (use them as ${ALIAS_PREFIX}name)`);

  template
    .command('list')
    .description('List named templates')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const templates = await manager.getTemplates();
        const names = Object.keys(templates).sort();
        const width = Math.max(0, ...names.map((n) => n.length + ALIAS_PREFIX.length));

        output(
          templates,
          names.length > 0
            ? names.map((n) => `${(ALIAS_PREFIX + n).padEnd(width)}  ${templates[n]}`).join('\n')
            : 'No templates defined. Add one with: pathgrid config template set <name> <template>'
        );
      } catch (error) {
        fail('Failed to list templates', error);
      }
    });

  template
    .command('set')
    .description('Add or replace a named template')
    .argument('<name>', 'Template name')
    .argument('<template>', 'Naming template')
    .action(async (name: string, text: string) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        await manager.setTemplate(name, text);
        outputSuccess(`Template ${ALIAS_PREFIX}${name} saved`, { name, template: text });
      } catch (error) {
        fail(`Failed to save template ${ALIAS_PREFIX}${name}`, error);
      }
    });

  template
    .command('remove')
    .description('Remove a named template')
    .argument('<name>', 'Template name')
    .action(async (name: string) => {
      let removed = false;
      try {
        const manager = new ConfigManager(getConfigPath());
        removed = await manager.removeTemplate(name);
      } catch (error) {
        fail(`Failed to remove template ${ALIAS_PREFIX}${name}`, error);
      }
      if (!removed) {
        fail(`Template ${ALIAS_PREFIX}${name} not found`);
      }
      outputSuccess(`Template ${ALIAS_PREFIX}${name} removed`);
    });

  return cmd;
}
