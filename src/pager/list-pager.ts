/**
 * List pager
 *
 * Accumulates rows into a table one object at a time. With paging on, a
 * page is flushed as soon as the next row would overflow the terminal
 * height, and the user is asked whether to continue. Every flush checks the
 * rendered width: a table that is still wider than the terminal after
 * wrapping is rebuilt once with wrapping turned off.
 */

import type {
  FormatterMap,
  Printer,
  PromptFn,
  RenderContext,
  ResourceObject,
  TerminalSize,
} from '../types/index.js';
import { getWidth, withNoWrap } from '../formatters/index.js';
import { buildRow, rowHeight, ResourceTable, wrapHeaderLabels } from '../table/index.js';
import { logger } from '../utils/logger.js';
import { CONTINUE_PROMPT, isQuitAnswer, readLine } from './prompt.js';
import { getTerminalSize } from './terminal.js';
import type { PagerOptions, PagerState } from './types.js';

function defaultPrinter(text: string): void {
  console.log(text);
}

export class ListPager {
  private readonly fields: readonly string[];
  private readonly labels: readonly string[];
  private readonly formatters: FormatterMap;
  private readonly paging: boolean;
  private readonly context: RenderContext;
  private readonly printer: Printer;
  private readonly prompt: PromptFn;
  private readonly terminal: TerminalSize;

  private state: PagerState = 'empty';
  private table: ResourceTable | null = null;
  /** Objects behind the rows of the current page, for the unwrapped rebuild */
  private pageObjects: ResourceObject[] = [];
  private headerHeight = 0;
  private linesLeft: number;
  private rowsOnPage = 0;
  /** Tail of the addRow queue; rows are handled one at a time, in call order */
  private pending: Promise<boolean> = Promise.resolve(true);

  constructor(options: PagerOptions) {
    if (options.fields.length !== options.labels.length) {
      throw new Error(
        `Field count (${options.fields.length}) does not match label count (${options.labels.length})`
      );
    }
    this.fields = options.fields;
    this.labels = options.labels;
    this.formatters = options.formatters;
    this.paging = options.paging ?? true;
    this.context = options.context ?? { noWrap: false };
    this.printer = options.printer ?? defaultPrinter;
    this.prompt = options.prompt ?? readLine;
    this.terminal = options.terminal ?? getTerminalSize();
    this.linesLeft = this.terminal.height;
  }

  getState(): PagerState {
    return this.state;
  }

  /** Lines still free on the current page */
  getLinesLeft(): number {
    return this.linesLeft;
  }

  getHeaderHeight(): number {
    return this.headerHeight;
  }

  /**
   * Add one object as a row.
   * Resolves false once the user has quit (or the pager is finished):
   * the caller should stop feeding rows. Calls made while an earlier row
   * waits at the continue prompt are queued behind it.
   */
  addRow(obj: ResourceObject): Promise<boolean> {
    const result = this.pending.then(() => this.processRow(obj));
    // A failed row rejects its own promise only; later rows still run
    this.pending = result.catch(() => false);
    return result;
  }

  private async processRow(obj: ResourceObject): Promise<boolean> {
    if (this.state === 'terminated' || this.state === 'finished') {
      return false;
    }
    if (!this.table) {
      this.startPage();
    }

    const row = buildRow(this.fields, this.formatters, obj, this.context);

    if (!this.paging) {
      this.append(row, obj);
      return true;
    }

    const height = rowHeight(row);
    // The first row of a page always goes in, however tall
    if (this.rowsOnPage === 0 || this.linesLeft - height >= 0) {
      this.append(row, obj);
      this.linesLeft -= height;
      return true;
    }

    this.state = 'page-full';
    this.printer(this.render());
    if (this.linesLeft > 0) {
      this.printer('\n'.repeat(this.linesLeft - 1));
    }

    const answer = await this.prompt(CONTINUE_PROMPT);
    if (isQuitAnswer(answer)) {
      this.state = 'terminated';
      return false;
    }

    this.startPage();
    this.append(row, obj);
    this.linesLeft -= height;
    return true;
  }

  /**
   * Flush whatever has not been printed yet
   */
  done(): void {
    if (this.state === 'terminated' || this.state === 'finished') {
      return;
    }
    if (this.state === 'page-full') {
      throw new Error('done() called while a row is waiting at the continue prompt');
    }
    if (!this.paging || this.rowsOnPage > 0) {
      this.printer(this.render());
    }
    this.state = 'finished';
  }

  /**
   * Render the current page, falling back to an unwrapped table when the
   * wrapped one is wider than the terminal
   */
  render(): string {
    const table = this.table ?? this.createTable(this.context);
    const output = table.toString();
    if (this.context.noWrap) {
      return output;
    }

    const width = getWidth(output);
    if (width <= this.terminal.width) {
      return output;
    }

    logger.info(
      `table is ${width} columns wide on a ${this.terminal.width} column terminal, rendering without wrapping`,
      'pager'
    );
    const unwrapped = withNoWrap(this.context);
    const rebuilt = this.createTable(unwrapped);
    for (const obj of this.pageObjects) {
      rebuilt.addRow(buildRow(this.fields, this.formatters, obj, unwrapped));
    }
    return rebuilt.toString();
  }

  private createTable(context: RenderContext): ResourceTable {
    return new ResourceTable(wrapHeaderLabels(this.fields, this.labels, this.formatters, context));
  }

  /**
   * Start a fresh page: new table, header recomputed, full height available
   */
  private startPage(): ResourceTable {
    const table = this.createTable(this.context);
    this.table = table;
    this.headerHeight = table.headerHeight;
    this.linesLeft = this.terminal.height - this.headerHeight;
    this.pageObjects = [];
    this.rowsOnPage = 0;
    this.state = 'accumulating';
    return table;
  }

  private append(row: string[], obj: ResourceObject): void {
    const table = this.table ?? this.startPage();
    table.addRow(row);
    this.pageObjects.push(obj);
    this.rowsOnPage++;
  }
}
