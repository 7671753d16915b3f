/**
 * Terminal geometry
 *
 * Size lookup order:
 *   1. The first TTY among stdout and stderr
 *   2. COLUMNS / LINES environment variables (each on its own)
 *   3. Configured defaults (80x25 unless overridden)
 */

import type { WriteStream } from 'tty';
import type { TerminalSize } from '../types/index.js';
import { DEFAULT_TERMINAL } from '../types/index.js';
import { env } from '../utils/env.js';
import { logger } from '../utils/logger.js';

export interface TerminalSizeOptions {
  /** Streams to query, in order (default: stdout, stderr) */
  streams?: ReadonlyArray<Pick<WriteStream, 'isTTY' | 'getWindowSize'>>;
  /** Size used when neither a TTY nor the environment knows */
  defaults?: TerminalSize;
}

/**
 * Ask a stream for its window size; null when it is not a terminal or the query fails
 */
export function queryWindowSize(stream: Pick<WriteStream, 'isTTY' | 'getWindowSize'>): TerminalSize | null {
  if (!stream.isTTY) {
    return null;
  }
  try {
    const [width, height] = stream.getWindowSize();
    if (!width || !height) {
      return null;
    }
    return { width, height };
  } catch (error) {
    logger.info(`window size query failed: ${error instanceof Error ? error.message : String(error)}`, 'terminal');
    return null;
  }
}

/**
 * Parse a positive integer from an environment variable; null when unset or invalid
 */
function envDimension(name: string): number | null {
  const raw = env(name);
  if (!raw) {
    return null;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn(`ignoring ${name}=${raw}: not a positive integer`, 'terminal');
    return null;
  }
  return value;
}

/**
 * Current terminal width and height in character cells
 */
export function getTerminalSize(options: TerminalSizeOptions = {}): TerminalSize {
  const streams = options.streams ?? [process.stdout, process.stderr];
  for (const stream of streams) {
    const size = queryWindowSize(stream);
    if (size) {
      return size;
    }
  }

  const defaults = options.defaults ?? DEFAULT_TERMINAL;
  const size = {
    width: envDimension('COLUMNS') ?? defaults.width,
    height: envDimension('LINES') ?? defaults.height,
  };
  logger.info(`no terminal attached, using ${size.width}x${size.height}`, 'terminal');
  return size;
}
