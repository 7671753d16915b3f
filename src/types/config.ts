/**
 * Configuration types for pagetab
 */

export interface TerminalDefaults {
  /** Width used when the terminal size cannot be queried */
  width: number;
  /** Height used when the terminal size cannot be queried */
  height: number;
}

export interface Config {
  version: 1;
  /** Pause after each screenful when output is interactive */
  paging: boolean;
  /** Word-wrap columns to fit the terminal */
  wrap: boolean;
  terminal: TerminalDefaults;
}

export const DEFAULT_TERMINAL: TerminalDefaults = {
  width: 80,
  height: 25,
};

export const DEFAULT_CONFIG: Config = {
  version: 1,
  paging: true,
  wrap: true,
  terminal: { ...DEFAULT_TERMINAL },
};
