/**
 * Command input: reading and checking the JSON documents commands print
 */

import type { ResourceObject } from '../types/index.js';
import { readInput } from '../utils/fs.js';
import { isRecord } from '../utils/guards.js';

/**
 * Error types for command input
 */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly code: 'READ' | 'PARSE' | 'SHAPE' | 'USAGE'
  ) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * Read the input document from a file, or stdin for none or '-'
 */
export async function readDocument(file?: string): Promise<string> {
  try {
    return await readInput(file);
  } catch (error) {
    throw new InputError(error instanceof Error ? error.message : String(error), 'READ');
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputError(`Invalid JSON: ${error instanceof Error ? error.message : 'parse error'}`, 'PARSE');
  }
}

/**
 * Parse a JSON array of objects
 */
export function parseObjectList(text: string): ResourceObject[] {
  const parsed = parseJson(text);
  if (!Array.isArray(parsed)) {
    throw new InputError('Input must be a JSON array of objects', 'SHAPE');
  }

  const objects: ResourceObject[] = [];
  parsed.forEach((item: unknown, i) => {
    if (!isRecord(item)) {
      throw new InputError(`Item ${i} is not an object`, 'SHAPE');
    }
    objects.push(item);
  });
  return objects;
}

/**
 * Parse a single JSON object
 */
export function parseObject(text: string): ResourceObject {
  const parsed = parseJson(text);
  if (!isRecord(parsed)) {
    throw new InputError('Input must be a JSON object', 'SHAPE');
  }
  return parsed;
}

/**
 * Split a comma-separated option value, dropping blanks
 */
export function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
