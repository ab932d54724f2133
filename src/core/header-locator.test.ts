import { describe, it, expect } from 'vitest';
import { locateHeader } from './header-locator.js';
import type { RawTable } from '../types/index.js';

describe('locateHeader', () => {
  it('returns the first row that contains a header token', () => {
    const rows: RawTable = [
      ['Quarterly report', null],
      ['Prepared by operations', null],
      ['Version 3', null],
      ['Agreement', 'Expiry Date'],
      ['Hosting', '04/06/2024'],
    ];

    expect(locateHeader(rows)).toEqual({ index: 3, confident: true });
  });

  it('passes over a sheet title that mentions renewals and dates', () => {
    const rows: RawTable = [
      ['Renewal Agreements 2024'],
      ['Updated: March, effective date varies'],
      ['Client Name', 'Contact Email', 'Expiry Date'],
    ];

    expect(locateHeader(rows)).toEqual({ index: 2, confident: true });
  });

  it('skips blank and fully numeric rows', () => {
    const rows: RawTable = [
      [null, null],
      [2024, 45447],
      ['Client', 'Due'],
    ];

    expect(locateHeader(rows)).toEqual({ index: 2, confident: true });
  });

  it('takes the first match without scoring later rows', () => {
    const rows: RawTable = [['Name of report'], ['Name', 'Email', 'Expiry']];

    expect(locateHeader(rows).index).toBe(0);
  });

  it('falls back to row 0 with low confidence when nothing matches', () => {
    const rows: RawTable = [
      ['alpha', 'beta'],
      ['gamma', 'delta'],
    ];

    expect(locateHeader(rows)).toEqual({ index: 0, confident: false });
  });

  it('only scans up to maxScan rows', () => {
    const rows: RawTable = [['alpha'], ['beta'], ['gamma'], ['Expiry']];

    expect(locateHeader(rows, { maxScan: 2 })).toEqual({ index: 0, confident: false });
    expect(locateHeader(rows, { maxScan: 4 })).toEqual({ index: 3, confident: true });
  });

  it('accepts a custom token list', () => {
    const rows: RawTable = [['Liste'], ['Vertrag', 'Ablauf']];

    expect(locateHeader(rows, { tokens: ['ablauf'] })).toEqual({ index: 1, confident: true });
  });
});
