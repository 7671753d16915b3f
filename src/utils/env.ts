/**
 * Environment variable lookup
 */

export interface EnvOptions {
  /** Returned when none of the variables is set (default: '') */
  default?: string;
}

/**
 * Return the first non-empty environment variable among `names`
 *
 * @example
 * env('PAGETAB_COLUMNS', 'COLUMNS', { default: '80' })
 */
export function env(...args: Array<string | EnvOptions>): string {
  let fallback = '';
  for (const arg of args) {
    if (typeof arg !== 'string') {
      fallback = arg.default ?? fallback;
      continue;
    }
    const value = process.env[arg];
    if (value) {
      return value;
    }
  }
  return fallback;
}
