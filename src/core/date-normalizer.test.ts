import { describe, it, expect } from 'vitest';
import { fromExcelSerial, parseDate } from './date-normalizer.js';

const june4 = new Date(2024, 5, 4);

describe('parseDate', () => {
  it('accepts Date values and drops the time of day', () => {
    expect(parseDate(new Date(2024, 5, 4, 15, 30))).toEqual(june4);
  });

  it('reads Excel serial numbers', () => {
    expect(parseDate(45447)).toEqual(june4);
  });

  it('reads ISO dates with and without a time part', () => {
    expect(parseDate('2024-06-04')).toEqual(june4);
    expect(parseDate('2024-06-04 10:30:00')).toEqual(june4);
    expect(parseDate('2024-06-04T10:30:00')).toEqual(june4);
  });

  it('reads ambiguous numeric dates day-first by default', () => {
    expect(parseDate('03/04/2024')).toEqual(new Date(2024, 3, 3));
    expect(parseDate('03/04/2024', false)).toEqual(new Date(2024, 2, 4));
  });

  it('falls back to the other order when the preferred one is impossible', () => {
    expect(parseDate('12/25/2024')).toEqual(new Date(2024, 11, 25));
    expect(parseDate('25/12/2024', false)).toEqual(new Date(2024, 11, 25));
  });

  it('accepts dot, dash and two-digit-year variants', () => {
    expect(parseDate('04.06.2024')).toEqual(june4);
    expect(parseDate('04-06-2024')).toEqual(june4);
    expect(parseDate('04.06.24')).toEqual(june4);
    expect(parseDate('20240604')).toEqual(june4);
  });

  it('reads textual months', () => {
    expect(parseDate('4 June 2024')).toEqual(june4);
    expect(parseDate('4 Jun 2024')).toEqual(june4);
    expect(parseDate('June 4, 2024')).toEqual(june4);
    expect(parseDate('04-Jun-2024')).toEqual(june4);
  });

  it('returns null for values that are not dates', () => {
    expect(parseDate('TBD')).toBeNull();
    expect(parseDate('')).toBeNull();
    expect(parseDate('   ')).toBeNull();
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate(true)).toBeNull();
    expect(parseDate('31/02/2024')).toBeNull();
    expect(parseDate('13/13/2024')).toBeNull();
    expect(parseDate(12)).toBeNull();
    expect(parseDate(new Date('invalid'))).toBeNull();
  });
});

describe('fromExcelSerial', () => {
  it('rejects serials outside the supported range', () => {
    expect(fromExcelSerial(60)).toBeNull();
    expect(fromExcelSerial(3_000_000)).toBeNull();
    expect(fromExcelSerial(Number.NaN)).toBeNull();
  });

  it('ignores the fractional time part', () => {
    expect(fromExcelSerial(45447.75)).toEqual(june4);
  });
});
