/**
 * List command
 *
 * pagetab list [file] prints a JSON array of objects as a table, paged when
 * both stdin and stdout are a terminal.
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { printLongList, sortForList } from '../list/index.js';
import { getTerminalSize } from '../pager/index.js';
import type { ResourceObject } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { output, outputError, getOutputOptions } from '../utils/output.js';
import { canPromptForPages } from '../utils/platform.js';
import { InputError, parseObjectList, readDocument, splitList } from './input.js';

export interface ListCommandOptions {
  fields?: string;
  labels?: string;
  sortBy?: string;
  /** false with --no-sort */
  sort: boolean;
  reverse?: boolean;
  nowrap?: boolean;
  unwrappedFields?: string;
  /** false with --no-paging */
  paging: boolean;
}

export interface ListPlan {
  fields: string[];
  labels: string[];
  sortBy: number | null;
  reverse: boolean;
  noWrapFields: string[];
}

/**
 * Resolve columns, labels and sorting from the command options
 */
export function planList(objects: readonly ResourceObject[], options: ListCommandOptions): ListPlan {
  const fields = options.fields ? splitList(options.fields) : Object.keys(objects[0] ?? {});
  if (fields.length === 0) {
    throw new InputError('No fields to show; pass --fields', 'USAGE');
  }

  const labels = options.labels ? splitList(options.labels) : fields;
  if (labels.length !== fields.length) {
    throw new InputError(`${labels.length} labels given for ${fields.length} fields`, 'USAGE');
  }

  let sortBy: number | null = options.sort ? 0 : null;
  if (options.sort && options.sortBy) {
    sortBy = fields.indexOf(options.sortBy);
    if (sortBy === -1) {
      throw new InputError(`Unknown sort field: ${options.sortBy}`, 'USAGE');
    }
  }

  return {
    fields,
    labels,
    sortBy,
    reverse: options.reverse ?? false,
    noWrapFields: splitList(options.unwrappedFields),
  };
}

export function createListCommand(getConfigPath: () => string): Command {
  return new Command('list')
    .description('Print a JSON array of objects as a table')
    .argument('[file]', 'JSON file to read (default: stdin)')
    .option('-f, --fields <list>', 'Comma-separated fields to show (default: keys of the first object)')
    .option('-l, --labels <list>', 'Comma-separated column labels (default: field names)')
    .option('-s, --sort-by <field>', 'Field to sort by (default: first field)')
    .option('--no-sort', 'Keep input order')
    .option('-r, --reverse', 'Sort descending')
    .option('--nowrap', 'Do not wrap column values')
    .option('--unwrapped-fields <list>', 'Comma-separated fields that are never wrapped')
    .option('--no-paging', 'Print everything at once')
    .action(async (file: string | undefined, options: ListCommandOptions) => {
      try {
        const objects = parseObjectList(await readDocument(file));
        const plan = planList(objects, options);

        if (getOutputOptions().json) {
          output(sortForList(objects, plan.fields, {}, plan.sortBy, plan.reverse));
          return;
        }

        const config = await new ConfigManager(getConfigPath()).loadOrDefault();
        const paging = options.paging && config.paging && canPromptForPages();
        logger.info(`listing ${objects.length} objects, paging ${paging ? 'on' : 'off'}`, 'list');

        await printLongList(objects, plan.fields, plan.labels, {
          sortBy: plan.sortBy,
          reverse: plan.reverse,
          noWrapFields: plan.noWrapFields,
          paging,
          noWrap: Boolean(options.nowrap) || !config.wrap,
          terminal: getTerminalSize({ defaults: config.terminal }),
        });
      } catch (error) {
        outputError('Failed to list objects', error);
        process.exit(1);
      }
    });
}
