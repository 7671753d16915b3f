/**
 * Timestamp localization
 *
 * API servers report timestamps in UTC. Before display, every timestamp found
 * inside a string value is rewritten in the local time zone with an explicit
 * offset, keeping the original layout (separator and microseconds).
 */

/** Candidate timestamps embedded in free text (not already carrying an offset) */
const TIMESTAMP_PATTERN =
  /(\d{4}-\d{2}-\d{2}[T ])?\d{2}:\d{2}:\d{2}(\.\d{6})?Z?(?!\.\d{6}|[+-]\d{2}:?\d{2})/g;

/** Accepted layouts: date, T or space, time, optional microseconds, optional Z */
const TIMESTAMP_LAYOUT =
  /^(\d{4})-(\d{2})-(\d{2})([T ])(\d{2}):(\d{2}):(\d{2})(\.\d{6})?(Z)?$/;

function pad(n: number, width: number = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Format a UTC offset in minutes as ±HH:MM
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Convert a single UTC timestamp to local time.
 * Returns null when the text matches none of the accepted layouts.
 */
export function localizeTimestamp(text: string): string | null {
  const match = TIMESTAMP_LAYOUT.exec(text);
  if (!match) {
    return null;
  }

  const [, y, mo, d, separator, h, mi, s, fraction, zulu] = match;

  // Z is only accepted on the plain T layout
  if (zulu && (fraction || separator === ' ')) {
    return null;
  }

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  // setUTCFullYear keeps years 0-99 as given (Date.UTC maps them to 19xx)
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  utc.setUTCHours(hour, minute, second, 0);
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day ||
    utc.getUTCHours() !== hour ||
    utc.getUTCMinutes() !== minute ||
    utc.getUTCSeconds() !== second
  ) {
    return null;
  }

  const date = `${pad(utc.getFullYear(), 4)}-${pad(utc.getMonth() + 1)}-${pad(utc.getDate())}`;
  const time = `${pad(utc.getHours())}:${pad(utc.getMinutes())}:${pad(utc.getSeconds())}`;
  const offset = formatUtcOffset(-utc.getTimezoneOffset());

  return `${date}${separator}${time}${fraction ?? ''}${offset}`;
}

/**
 * Localize every timestamp inside a value.
 *
 * Non-string values are returned unchanged, as are substrings that look like
 * a timestamp but do not parse (time-only values, impossible dates).
 * Localized output carries an offset and is never matched again, so applying
 * this twice gives the same result as applying it once.
 *
 * @example
 * // with TZ=Asia/Tokyo
 * localizeTimestamps('raised 2024-03-01T10:20:30Z') // 'raised 2024-03-01T19:20:30+09:00'
 */
export function localizeTimestamps(value: string): string;
export function localizeTimestamps(value: unknown): unknown;
export function localizeTimestamps(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  return value.replace(TIMESTAMP_PATTERN, (candidate) => localizeTimestamp(candidate) ?? candidate);
}
