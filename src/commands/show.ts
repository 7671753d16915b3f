/**
 * Show command
 *
 * pagetab show [file] prints one JSON object as a property/value table.
 */

import { Command, InvalidArgumentError } from 'commander';
import { printDict } from '../list/index.js';
import { output, outputError, getOutputOptions } from '../utils/output.js';
import { parseObject, readDocument } from './input.js';

export interface ShowCommandOptions {
  wrap: number;
  propertyLabel: string;
}

/**
 * Parse the --wrap value: a whole number of columns, 0 for no wrapping
 */
export function parseWrapWidth(value: string): number {
  const width = Number(value);
  if (!Number.isInteger(width) || width < 0) {
    throw new InvalidArgumentError('Expected a whole number of columns.');
  }
  return width;
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Print a JSON object as a property/value table')
    .argument('[file]', 'JSON file to read (default: stdin)')
    .option('-w, --wrap <columns>', 'Wrap values to this many columns', parseWrapWidth, 0)
    .option('-p, --property-label <label>', 'Label of the property column', 'Property')
    .action(async (file: string | undefined, options: ShowCommandOptions) => {
      try {
        const record = parseObject(await readDocument(file));

        if (getOutputOptions().json) {
          output(record);
          return;
        }

        printDict(record, { propertyLabel: options.propertyLabel, wrap: options.wrap });
      } catch (error) {
        outputError('Failed to show object', error);
        process.exit(1);
      }
    });
}
