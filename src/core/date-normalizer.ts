import { isValid, parse, parseISO, startOfDay } from 'date-fns';
import type { RawCell } from '../types/index.js';

const MIN_YEAR = 1900;
const MAX_YEAR = 2200;

/** Serial 61 is 1900-03-01, past the 1900 leap-year bug in Excel's date system */
const MIN_EXCEL_SERIAL = 61;
const MAX_EXCEL_SERIAL = 2958465;

const NUMERIC_DATE = /^(\d{1,4})[-/. ]+(\d{1,2})[-/. ]+(\d{1,4})$/;
const COMPACT_DATE = /^\d{8}$/;
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T/;
const TRAILING_TIME = /^(.*?\d)[ T]+\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:[ap]\.?m\.?)?$/i;

const TEXTUAL_FORMATS = [
  'd MMM yyyy',
  'd MMMM yyyy',
  'd-MMM-yyyy',
  'd-MMM-yy',
  'd MMM yy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'MMM d yyyy',
  'MMMM d yyyy',
  'EEEE, MMMM d, yyyy',
  'EEE, d MMM yyyy',
];

function withinRange(date: Date): boolean {
  const year = date.getFullYear();
  return isValid(date) && year >= MIN_YEAR && year <= MAX_YEAR;
}

function tryFormats(value: string, formats: readonly string[]): Date | null {
  const reference = new Date();
  for (const format of formats) {
    const parsed = parse(value, format, reference);
    if (withinRange(parsed)) {
      return startOfDay(parsed);
    }
  }
  return null;
}

/**
 * Excel stores dates as days since 1899-12-30 (1900 date system)
 */
export function fromExcelSerial(serial: number): Date | null {
  if (!Number.isFinite(serial) || serial < MIN_EXCEL_SERIAL || serial > MAX_EXCEL_SERIAL) {
    return null;
  }
  const date = new Date(1899, 11, 30 + Math.floor(serial));
  return withinRange(date) ? date : null;
}

function numericFormats(first: string, last: string, dayFirst: boolean): string[] {
  if (first.length === 4) {
    return ['yyyy-M-d'];
  }
  const year = last.length === 4 ? 'yyyy' : last.length === 2 ? 'yy' : null;
  if (!year) return [];

  const dayMonth = `d-M-${year}`;
  const monthDay = `M-d-${year}`;
  return dayFirst ? [dayMonth, monthDay] : [monthDay, dayMonth];
}

function parseDateString(raw: string, dayFirst: boolean): Date | null {
  const value = raw.trim().replace(/\s+/g, ' ');
  if (!value) return null;

  if (ISO_DATETIME.test(value)) {
    const parsed = parseISO(value);
    return withinRange(parsed) ? startOfDay(parsed) : null;
  }

  const datePart = value.match(TRAILING_TIME)?.[1] ?? value;

  if (COMPACT_DATE.test(datePart)) {
    return tryFormats(datePart, ['yyyyMMdd']);
  }

  const numeric = datePart.match(NUMERIC_DATE);
  if (numeric) {
    const [, first, second, last] = numeric;
    return tryFormats(`${first}-${second}-${last}`, numericFormats(first, last, dayFirst));
  }

  return tryFormats(datePart, TEXTUAL_FORMATS);
}

/**
 * Parse a spreadsheet cell into a calendar date at local midnight.
 *
 * Ambiguous numeric dates such as 03/04/2024 are read day-first unless
 * `dayFirst` is false; when the preferred order is impossible (13/04 read
 * month-first) the other order is tried. Returns null for anything that is
 * not a date, never throws.
 */
export function parseDate(raw: RawCell | undefined, dayFirst = true): Date | null {
  if (raw === null || raw === undefined || typeof raw === 'boolean') {
    return null;
  }
  if (raw instanceof Date) {
    return withinRange(raw) ? startOfDay(raw) : null;
  }
  if (typeof raw === 'number') {
    return fromExcelSerial(raw);
  }
  return parseDateString(raw, dayFirst);
}
