import { logger } from '../utils/logger.js';
import type { HeaderLocation, RawCell, RawTable } from '../types/index.js';

export const DEFAULT_HEADER_TOKENS = [
  'expiry',
  'email',
  'name',
  'file',
  'due',
  'end',
  'expires',
  'client',
  'contact',
  'customer',
  'service',
  'business',
  'path',
];

export const DEFAULT_MAX_HEADER_SCAN = 50;

export interface HeaderLocatorOptions {
  maxScan?: number;
  tokens?: string[];
}

function cellText(cell: RawCell): string {
  if (cell === null) return '';
  // Dates and numbers are data, never labels
  if (cell instanceof Date || typeof cell === 'number' || typeof cell === 'boolean') return '';
  return cell;
}

/**
 * Find the row most likely to hold the column labels.
 * The first row whose text contains any header token wins; when none does,
 * row 0 is used and the result is flagged as low confidence.
 */
export function locateHeader(rows: RawTable, options: HeaderLocatorOptions = {}): HeaderLocation {
  const maxScan = options.maxScan ?? DEFAULT_MAX_HEADER_SCAN;
  const tokens = (options.tokens ?? DEFAULT_HEADER_TOKENS).map((token) => token.toLowerCase());
  const limit = Math.min(maxScan, rows.length);

  for (let index = 0; index < limit; index++) {
    const joined = rows[index].map(cellText).join(' ').toLowerCase();
    if (!joined.trim()) continue;

    if (tokens.some((token) => joined.includes(token))) {
      logger.debug('Header row located', { index });
      return { index, confident: true };
    }
  }

  logger.warn('No header row matched within scan window; using row 0', {
    scanned: limit,
  });
  return { index: 0, confident: false };
}
