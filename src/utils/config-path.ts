/**
 * Config path resolution utility
 * Priority:
 * 1) --config <path> (passed as argument)
 * 2) PAGETAB_CONFIG environment variable
 * 3) OS standard config location
 */

import { homedir, platform } from 'os';
import { join } from 'path';
import { env } from './env.js';

export function getDefaultConfigDir(): string {
  const home = homedir();

  switch (platform()) {
    case 'win32':
      // Windows: %APPDATA%\pagetab
      return join(env('APPDATA', { default: join(home, 'AppData', 'Roaming') }), 'pagetab');
    case 'darwin':
      // macOS: ~/Library/Application Support/pagetab
      return join(home, 'Library', 'Application Support', 'pagetab');
    default:
      // Linux and others: ~/.config/pagetab
      return join(env('XDG_CONFIG_HOME', { default: join(home, '.config') }), 'pagetab');
  }
}

export function getDefaultConfigPath(): string {
  return join(getDefaultConfigDir(), 'config.json');
}

export interface ConfigPathOptions {
  configPath?: string; // --config argument
}

export function resolveConfigPath(options: ConfigPathOptions = {}): string {
  if (options.configPath) {
    return options.configPath;
  }
  return env('PAGETAB_CONFIG', { default: getDefaultConfigPath() });
}
