/**
 * Config commands
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { output, outputSuccess, outputError } from '../utils/output.js';

export function createConfigCommand(getConfigPath: () => string): Command {
  const cmd = new Command('config')
    .description('Manage pagetab configuration');

  cmd
    .command('path')
    .description('Show the config file path')
    .action(() => {
      const configPath = getConfigPath();
      output({ path: configPath }, configPath);
    });

  cmd
    .command('init')
    .description('Initialize a new config file')
    .option('-f, --force', 'Overwrite existing config')
    .action(async (options: { force?: boolean }) => {
      try {
        const manager = new ConfigManager(getConfigPath());
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
        outputError('Failed to initialize config', error);
        process.exit(1);
      }
    });

  cmd
    .command('show')
    .description('Show the settings in effect')
    .action(async () => {
      try {
        const config = await new ConfigManager(getConfigPath()).loadOrDefault();
        output(config, JSON.stringify(config, null, 2));
      } catch (error) {
        outputError('Failed to load config', error);
        process.exit(1);
      }
    });

  cmd
    .command('validate')
    .description('Validate the config file')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const result = await manager.validate();

        if (result.valid) {
          outputSuccess('Config is valid');
        } else {
          output(
            { valid: false, errors: result.errors },
            `Config validation failed:\n${result.errors.map((e) => `  - ${e.path || '(root)'}: ${e.message}`).join('\n')}`
          );
          process.exit(1);
        }
      } catch (error) {
        outputError('Failed to validate config', error);
        process.exit(1);
      }
    });

  return cmd;
}
