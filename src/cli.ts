#!/usr/bin/env node
/**
 * pathgrid CLI
 * Tabulate the parameters encoded in file names
 *
 * Commands:
 *   pathgrid scan      # Find files by naming template and print a table
 *   pathgrid pattern   # Show the glob pattern a template resolves to
 *   pathgrid fields    # List a template's placeholders
 *   pathgrid config    # Configuration and named templates
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { locateConfig, type ConfigLocation } from './config/index.js';
import { setOutputOptions } from './utils/output.js';
import {
  createScanCommand,
  createPatternCommand,
  createFieldsCommand,
  createConfigCommand,
} from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');
const VERSION = packageJson.version;

const program = new Command();

// Global state for config path
let globalConfigPath: string | undefined;

function locate(): ConfigLocation {
  return locateConfig({ explicit: globalConfigPath });
}

function getConfigPath(): string {
  return locate().path;
}

const HELP_HEADER = `
pathgrid - tabulate parameters encoded in file names

Templates use named placeholders with optional types:
  {name}      any text          {name:d}    integer
  {name:w}    word characters   {name:.2f}  fixed-point number
Unbound placeholders become * in the search pattern.

Examples:
  pathgrid scan 'data/run{run:d}_p{parameter:d}.csv'
  pathgrid scan 'data/run{run:d}_p{parameter:d}.csv' --where run=1
  pathgrid pattern 'data/run{run:03d}_p{parameter:d}.csv' 7
`;

program
  .name('pathgrid')
  .description('Discover files by naming template and tabulate the values in their names')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string; json?: boolean; verbose?: boolean }>();
    globalConfigPath = opts.config;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
  });

program.addCommand(createScanCommand(getConfigPath));
program.addCommand(createPatternCommand(getConfigPath));
program.addCommand(createFieldsCommand(getConfigPath));
program.addCommand(createConfigCommand(locate));

program.parse();
