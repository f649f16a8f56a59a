import { ColumnType } from '../types/schema';

export type DateFormat = 'YYYY-MM-DD' | 'YYYY-MM-DD HH:MM:SS' | 'MM/DD/YYYY' | 'DD/MM/YYYY';

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}

interface DatePattern {
  format: DateFormat;
  pattern: RegExp;
  toParts: (groups: string[]) => DateParts;
}

// Tried in order; the first pattern that yields a real calendar date wins.
const DATE_PATTERNS: readonly DatePattern[] = [
  {
    format: 'YYYY-MM-DD',
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    toParts: ([y, m, d]) => ({ year: Number(y), month: Number(m), day: Number(d) }),
  },
  {
    format: 'YYYY-MM-DD HH:MM:SS',
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{1,2}):(\d{1,2})$/,
    toParts: ([y, m, d, h, min, s]) => ({
      year: Number(y),
      month: Number(m),
      day: Number(d),
      hour: Number(h),
      minute: Number(min),
      second: Number(s),
    }),
  },
  {
    format: 'MM/DD/YYYY',
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    toParts: ([m, d, y]) => ({ year: Number(y), month: Number(m), day: Number(d) }),
  },
  {
    format: 'DD/MM/YYYY',
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    toParts: ([d, m, y]) => ({ year: Number(y), month: Number(m), day: Number(d) }),
  },
];

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

function isRealDate(parts: DateParts): boolean {
  const { year, month, day, hour = 0, minute = 0, second = 0 } = parts;
  if (year < 1 || month < 1 || month > 12) return false;
  if (day < 1 || day > daysInMonth(year, month)) return false;
  return hour <= 23 && minute <= 59 && second <= 59;
}

/**
 * Return the first supported format the value parses under, or null.
 * "01/02/2024" is always January 2nd: MM/DD/YYYY is tried before DD/MM/YYYY.
 */
export function matchDateFormat(value: string): DateFormat | null {
  for (const { format, pattern, toParts } of DATE_PATTERNS) {
    const match = pattern.exec(value);
    if (match && isRealDate(toParts(match.slice(1)))) {
      return format;
    }
  }
  return null;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIALS = /^[+-]?(?:inf|infinity|nan)$/i;
const BOOLEAN_VALUES = new Set(['true', 'false', '1', '0', 'yes', 'no']);

/**
 * One parse check per column type. Values reaching these are trimmed and non-empty.
 */
export const TYPE_CHECKERS: Readonly<Record<ColumnType, (value: string) => boolean>> = {
  string: () => true,
  integer: value => INTEGER_PATTERN.test(value),
  float: value => FLOAT_PATTERN.test(value) || FLOAT_SPECIALS.test(value),
  boolean: value => BOOLEAN_VALUES.has(value.toLowerCase()),
  date: value => matchDateFormat(value) !== null,
};

export function conformsToType(value: string, type: ColumnType): boolean {
  return TYPE_CHECKERS[type](value);
}
