import { MissingColumnError } from '../utils/error-handler.js';
import type { ColumnKeywords, ColumnRole, ColumnRoleMap } from '../types/index.js';

/** Evaluation order of the roles */
export const COLUMN_ROLES: readonly ColumnRole[] = [
  'expiry',
  'email',
  'name',
  'file',
  'path',
  'service',
  'business',
];

export const DEFAULT_COLUMN_KEYWORDS: ColumnKeywords = {
  expiry: ['expiry', 'due', 'end', 'expires'],
  email: ['email', 'contact'],
  name: ['name', 'client', 'contact', 'customer', 'person'],
  file: ['file', 'filename'],
  path: ['path'],
  service: ['service'],
  business: ['business', 'client', 'company'],
};

/**
 * First column, in original order, whose lower-cased name contains the
 * highest-priority keyword that matches anything.
 */
export function matchColumn(columnNames: readonly string[], keywords: readonly string[]): string | undefined {
  const lowered = columnNames.map((name) => name.toLowerCase());

  for (const keyword of keywords) {
    const needle = keyword.toLowerCase();
    const index = lowered.findIndex((name) => name.includes(needle));
    if (index !== -1) {
      return columnNames[index];
    }
  }
  return undefined;
}

/**
 * Assign semantic roles to column names by keyword substring matching.
 * Roles are independent: one column may serve several roles.
 */
export function classifyColumns(
  columnNames: readonly string[],
  keywords: ColumnKeywords = DEFAULT_COLUMN_KEYWORDS
): ColumnRoleMap {
  const roleMap: ColumnRoleMap = {};

  for (const role of COLUMN_ROLES) {
    const column = matchColumn(columnNames, keywords[role]);
    if (column !== undefined) {
      roleMap[role] = column;
    }
  }

  return roleMap;
}

/**
 * @throws MissingColumnError when no column carries expiry dates
 */
export function requireExpiryColumn(roleMap: ColumnRoleMap, columnNames: readonly string[]): string {
  if (!roleMap.expiry) {
    throw new MissingColumnError('expiry', [...columnNames]);
  }
  return roleMap.expiry;
}

export function missingOptionalRoles(roleMap: ColumnRoleMap): ColumnRole[] {
  return COLUMN_ROLES.filter((role) => role !== 'expiry' && roleMap[role] === undefined);
}
