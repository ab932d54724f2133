import { describe, it, expect } from 'vitest';
import {
  classifyColumns,
  DEFAULT_COLUMN_KEYWORDS,
  matchColumn,
  missingOptionalRoles,
  requireExpiryColumn,
} from './column-classifier.js';
import { MissingColumnError } from '../utils/error-handler.js';

describe('classifyColumns', () => {
  it('maps a typical renewal sheet', () => {
    const columns = ['Client Name', 'Contact Email', 'Renewal Due', 'File Path'];

    expect(classifyColumns(columns)).toEqual({
      expiry: 'Renewal Due',
      email: 'Contact Email',
      name: 'Client Name',
      file: 'File Path',
      path: 'File Path',
      business: 'Client Name',
    });
  });

  it('prefers a higher-priority keyword over column order', () => {
    const map = classifyColumns(['End Date', 'Expiry']);

    expect(map.expiry).toBe('Expiry');
  });

  it('takes the first column in original order for the same keyword', () => {
    const map = classifyColumns(['Expiry (old)', 'Expiry Date']);

    expect(map.expiry).toBe('Expiry (old)');
  });

  it('matches case-insensitively', () => {
    expect(classifyColumns(['EMAIL', 'DUE DATE'])).toMatchObject({
      email: 'EMAIL',
      expiry: 'DUE DATE',
    });
  });

  it('uses custom keyword lists', () => {
    const keywords = { ...DEFAULT_COLUMN_KEYWORDS, expiry: ['ablauf'] };

    expect(classifyColumns(['Kunde', 'Ablaufdatum'], keywords).expiry).toBe('Ablaufdatum');
  });

  it('leaves roles without a matching column out of the map', () => {
    const map = classifyColumns(['Email', 'Expiry']);

    expect(map).toEqual({ email: 'Email', expiry: 'Expiry' });
    expect(missingOptionalRoles(map)).toEqual(['name', 'file', 'path', 'service', 'business']);
  });
});

describe('matchColumn', () => {
  it('returns undefined when no keyword matches', () => {
    expect(matchColumn(['Amount', 'Owner'], ['email'])).toBeUndefined();
  });
});

describe('requireExpiryColumn', () => {
  it('returns the expiry column when present', () => {
    expect(requireExpiryColumn({ expiry: 'Due' }, ['Due'])).toBe('Due');
  });

  it('throws MissingColumnError without an expiry column', () => {
    const columns = ['Name', 'Email'];
    const map = classifyColumns(columns);

    expect(() => requireExpiryColumn(map, columns)).toThrow(MissingColumnError);
    expect(() => requireExpiryColumn(map, columns)).toThrow('Missing required column');
  });
});
