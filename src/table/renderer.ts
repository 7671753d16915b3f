/**
 * Table renderer
 *
 * Thin front for a cli-table3 table: left-aligned, uncolored, no rule
 * between data rows. A table is never edited in place; when its header or
 * wrapping changes the caller builds a new one and replays its rows.
 */

import Table from 'cli-table3';
import { rowHeight } from './height.js';

/** Top border, rule under the header, bottom border */
export const TABLE_BORDER_LINES = 3;

/** Line taken by the continue prompt under each page */
export const PROMPT_LINES = 1;

/**
 * Vertical space a page spends on everything but data rows
 */
export function headerHeight(labels: readonly string[]): number {
  return TABLE_BORDER_LINES + PROMPT_LINES + rowHeight(labels);
}

export class ResourceTable {
  private readonly table: Table.Table;
  private readonly labels: string[];
  private rows = 0;

  constructor(labels: readonly string[]) {
    this.labels = [...labels];
    this.table = new Table({
      head: this.labels,
      style: { head: [], border: [], compact: true },
    });
  }

  /** Lines used by borders, header and prompt */
  get headerHeight(): number {
    return headerHeight(this.labels);
  }

  get rowCount(): number {
    return this.rows;
  }

  addRow(row: readonly string[]): void {
    if (row.length !== this.labels.length) {
      throw new Error(`Row has ${row.length} cells but the table has ${this.labels.length} columns`);
    }
    this.table.push([...row]);
    this.rows++;
  }

  /**
   * Rendered table; empty when no rows were added
   */
  toString(): string {
    if (this.rows === 0) {
      return '';
    }
    return this.table.toString();
  }
}
