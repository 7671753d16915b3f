/**
 * Tests for wrapping formatters
 */

import { describe, it, expect, beforeAll } from 'vitest';
import {
  asWrappingFormatters,
  columnCharLen,
  formatField,
  getWidth,
  isWrappingFormatter,
  plainFormatter,
  tableChromeWidth,
  unwrappedFieldValue,
  withNoWrap,
  MIN_COLUMN_WIDTH,
} from './wrapping.js';
import type { Formatter, RenderContext, WrappingFormatter } from '../types/index.js';

const WRAP: RenderContext = { noWrap: false };

function wrapping(field: string, desiredWidth: number, overrides: Partial<WrappingFormatter> = {}): WrappingFormatter {
  return {
    kind: 'wrapping',
    field,
    render: (obj) => String(obj[field] ?? ''),
    unwrappedValue: (obj) => String(obj[field] ?? ''),
    desiredWidth,
    minWidth: MIN_COLUMN_WIDTH,
    maxWidth: 60,
    noWrap: false,
    ...overrides,
  };
}

function expectWrapping(formatter: Formatter | undefined): WrappingFormatter {
  if (!isWrappingFormatter(formatter)) {
    throw new Error('expected a wrapping formatter');
  }
  return formatter;
}

describe('asWrappingFormatters', () => {
  beforeAll(() => {
    process.env.TZ = 'UTC';
  });

  const wide = [{ a: 'x'.repeat(20), b: 'y'.repeat(40) }];

  it('keeps natural widths when the table fits', () => {
    const formatters = asWrappingFormatters(
      [{ name: 'alpha', status: 'up' }],
      ['name', 'status'],
      ['Name', 'Status'],
      {},
      { terminalWidth: 80 }
    );

    const name = expectWrapping(formatters.name);
    expect(name.desiredWidth).toBe(5);
    expect(name.maxWidth).toBe(5);
    expect(name.minWidth).toBe(5);
    expect(expectWrapping(formatters.status).desiredWidth).toBe(6);
  });

  it('shares the available width in proportion to natural width', () => {
    const formatters = asWrappingFormatters(wide, ['a', 'b'], ['A', 'B'], {}, { terminalWidth: 50 });

    expect(expectWrapping(formatters.a).desiredWidth).toBe(14);
    expect(expectWrapping(formatters.b).desiredWidth).toBe(28);
  });

  it('gives never-wrapped fields their natural width first', () => {
    const formatters = asWrappingFormatters(wide, ['a', 'b'], ['A', 'B'], {}, {
      terminalWidth: 50,
      noWrapFields: ['a'],
    });

    const a = expectWrapping(formatters.a);
    expect(a.noWrap).toBe(true);
    expect(a.desiredWidth).toBe(20);
    expect(expectWrapping(formatters.b).desiredWidth).toBe(23);
  });

  it('never shrinks a column below its minimum', () => {
    const formatters = asWrappingFormatters(wide, ['a', 'b'], ['A', 'B'], {}, { terminalWidth: 20 });

    expect(expectWrapping(formatters.a).desiredWidth).toBe(MIN_COLUMN_WIDTH);
    expect(expectWrapping(formatters.b).desiredWidth).toBe(MIN_COLUMN_WIDTH);
  });

  it('measures values after timestamp localization', () => {
    const formatters = asWrappingFormatters(
      [{ t: '2024-03-01T10:20:30Z' }],
      ['t'],
      ['Time'],
      {},
      { terminalWidth: 80 }
    );
    expect(expectWrapping(formatters.t).maxWidth).toBe('2024-03-01T10:20:30+00:00'.length);
  });

  it('wraps caller-supplied functions', () => {
    const formatters = asWrappingFormatters(
      [{ status: 'up' }],
      ['status'],
      ['S'],
      { status: (obj) => `state: ${String(obj.status)}` },
      { terminalWidth: 80 }
    );

    const status = expectWrapping(formatters.status);
    expect(status.render({ status: 'down' })).toBe('state: down');
    expect(status.maxWidth).toBe('state: up'.length);
    expect(unwrappedFieldValue(status, { status: 'down' })).toBe('state: down');
  });

  it('wraps plain formatters', () => {
    const formatters = asWrappingFormatters(
      [{ n: 1 }],
      ['n'],
      ['N'],
      { n: plainFormatter((obj) => `#${String(obj.n)}`) },
      { terminalWidth: 80 }
    );
    expect(expectWrapping(formatters.n).render({ n: 7 })).toBe('#7');
  });

  it('keeps formatters that are already wrapping', () => {
    const existing = wrapping('d', 12);
    const formatters = asWrappingFormatters([{ d: 'x' }], ['d'], ['D'], { d: existing }, { terminalWidth: 80 });

    const d = expectWrapping(formatters.d);
    expect(d.desiredWidth).toBe(12);
    expect(d.maxWidth).toBe(60);
  });

  it('sorts numbers by value when no formatter is given', () => {
    const formatters = asWrappingFormatters([{ count: 10 }], ['count'], ['Count'], {}, { terminalWidth: 80 });
    expect(unwrappedFieldValue(expectWrapping(formatters.count), { count: 10 })).toBe(10);
    expect(unwrappedFieldValue(expectWrapping(formatters.count), {})).toBe('');
  });
});

describe('formatField', () => {
  const text = 'the quick brown fox jumps';

  it('wraps text wider than the column', () => {
    expect(formatField(wrapping('d', 10), { d: text }, WRAP)).toBe('the quick\nbrown fox\njumps');
  });

  it('leaves text that fits unchanged', () => {
    expect(formatField(wrapping('d', 30), { d: 'a  b' }, WRAP)).toBe('a  b');
  });

  it('does not wrap under a no-wrap context', () => {
    expect(formatField(wrapping('d', 10), { d: text }, withNoWrap(WRAP))).toBe(text);
  });

  it('does not wrap fields forced to never wrap', () => {
    expect(formatField(wrapping('d', 10, { noWrap: true }), { d: text }, WRAP)).toBe(text);
  });

  it('produces the same words wrapped or unwrapped', () => {
    const formatter = wrapping('d', 10);
    const wrapped = formatField(formatter, { d: text }, WRAP);
    const unwrapped = formatField(formatter, { d: text }, withNoWrap(WRAP));
    expect(wrapped.replace(/\n/g, ' ')).toBe(unwrapped);
  });

  it('calls plain formatters directly', () => {
    expect(formatField(plainFormatter(() => 'fixed text here'), {}, WRAP)).toBe('fixed text here');
  });
});

describe('helpers', () => {
  it('withNoWrap returns a new context', () => {
    const context: RenderContext = { noWrap: false };
    expect(withNoWrap(context)).toEqual({ noWrap: true });
    expect(context.noWrap).toBe(false);
  });

  it('getWidth measures the widest line', () => {
    expect(getWidth('ab\nabcd\na')).toBe(4);
    expect(getWidth('')).toBe(0);
  });

  it('columnCharLen clamps to the formatter limits', () => {
    const formatter = wrapping('d', 10, { minWidth: 8, maxWidth: 20 });
    expect(columnCharLen(formatter)).toBe(10);
    expect(columnCharLen(formatter, 3)).toBe(8);
    expect(columnCharLen(formatter, 50)).toBe(20);
  });

  it('tableChromeWidth counts borders and padding', () => {
    expect(tableChromeWidth(2)).toBe(7);
  });
});
