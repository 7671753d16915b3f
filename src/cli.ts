#!/usr/bin/env node
/**
 * pagetab CLI
 * Print JSON resources as terminal tables
 *
 * Command structure:
 *   pagetab list [file]    # Table of a JSON array (default)
 *   pagetab show [file]    # Property/value table of a JSON object
 *   pagetab config         # Configuration
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveConfigPath } from './utils/config-path.js';
import { setOutputOptions } from './utils/output.js';
import { setVerbose } from './utils/logger.js';
import { createConfigCommand, createListCommand, createShowCommand } from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');
const VERSION = packageJson.version;

interface GlobalOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

const program = new Command();

// Global state for config path
let globalConfigPath: string | undefined;

function getConfigPath(): string {
  return resolveConfigPath({ configPath: globalConfigPath });
}

const HELP_HEADER = `
pagetab - print JSON resources as terminal tables

Commands:
  list          Table of a JSON array of objects (default)
  show          Property/value table of one JSON object
  config        Configuration management

Examples:
  pagetab list alarms.json                      # Page through a list
  cat alarms.json | pagetab -f id,severity      # Choose columns
  pagetab list alarms.json -s severity -r       # Sort descending
  pagetab show alarm.json -w 60                 # Wrap values at 60 columns
`;

program
  .name('pagetab')
  .description('Print JSON resources as terminal tables')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    globalConfigPath = opts.config;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
    setVerbose(opts.verbose ?? false);
  });

program.addCommand(createListCommand(getConfigPath));
program.addCommand(createShowCommand());
program.addCommand(createConfigCommand(getConfigPath));

function hasHelpFlag(): boolean {
  return process.argv.includes('--help') || process.argv.includes('-h');
}

function hasSubcommand(): boolean {
  const knownCommands = new Set(['list', 'show', 'config', 'help']);

  for (let i = 2; i < process.argv.length; i++) {
    const arg = process.argv[i];
    if (arg.startsWith('-')) {
      if (arg === '-c' || arg === '--config') {
        i++;
      }
      continue;
    }
    if (knownCommands.has(arg)) {
      return true;
    }
  }
  return false;
}

// Default to list when no subcommand specified
if (!hasSubcommand() && !hasHelpFlag() && !process.argv.includes('--version') && !process.argv.includes('-V')) {
  process.argv.splice(2, 0, 'list');
}

await program.parseAsync();
