import { format } from 'date-fns';
import { classifyColumns, missingOptionalRoles, requireExpiryColumn } from './column-classifier.js';
import { parseDate } from './date-normalizer.js';
import { locateHeader } from './header-locator.js';
import { ParsingError } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';
import type {
  Agreement,
  ColumnKeywords,
  ColumnRole,
  ColumnRoleMap,
  ExtractionResult,
  HeaderedTable,
  RawCell,
  RawTable,
  RowFailure,
  RowOutcome,
} from '../types/index.js';

export const UNNAMED_AGREEMENT = 'Unnamed Agreement';

export interface ExtractionOptions {
  dayFirst?: boolean;
  /** Used when a row has no usable email */
  defaultRecipient?: string;
}

export interface LoadOptions extends ExtractionOptions {
  maxHeaderScan?: number;
  headerTokens?: string[];
  columnKeywords?: ColumnKeywords;
}

/**
 * Collapse control characters (CR, LF, NUL, ...) and runs of whitespace.
 * Spreadsheet text ends up in mail headers, where a stray CRLF starts a new header.
 */
export function sanitizeHeaderValue(value: string): string {
  return value
    // eslint-disable-next-line no-control-regex
    .replace(/[\x00-\x1F\x7F]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * First address of a cell that may list several. A display-name form such as
 * `Jane Doe <jane@x.test>` yields the bracketed address.
 */
export function sanitizeEmail(value: string): string {
  const cleaned = sanitizeHeaderValue(value);
  const bracketed = cleaned.match(/<([^<>\s]+@[^<>\s]+)>/)?.[1];
  if (bracketed) return bracketed;

  const tokens = cleaned.split(/[\s,;]+/).filter(Boolean);
  return tokens.find((token) => token.includes('@')) ?? tokens[0] ?? '';
}

export function cellToString(cell: RawCell | undefined): string {
  if (cell === null || cell === undefined) return '';
  if (cell instanceof Date) return format(cell, 'yyyy-MM-dd');
  return String(cell);
}

function isBlankRow(row: RawCell[]): boolean {
  return row.every((cell) => cellToString(cell).trim() === '');
}

/**
 * Header labels as column names: blanks become column_N, repeats get a _2, _3 suffix
 */
export function buildColumnNames(headerRow: RawCell[]): string[] {
  const seen = new Map<string, number>();

  return headerRow.map((cell, index) => {
    const label = sanitizeHeaderValue(cellToString(cell)) || `column_${index + 1}`;
    const count = (seen.get(label) ?? 0) + 1;
    seen.set(label, count);
    return count === 1 ? label : `${label}_${count}`;
  });
}

export function toHeaderedTable(rows: RawTable, headerIndex: number): HeaderedTable {
  return {
    columns: buildColumnNames(rows[headerIndex] ?? []),
    rows: rows.slice(headerIndex + 1),
    headerIndex,
  };
}

function baseName(value: string): string {
  return value.split(/[\\/]/).filter(Boolean).pop() ?? '';
}

function extractRow(
  row: RawCell[],
  rowNumber: number,
  readRole: (row: RawCell[], role: ColumnRole) => RawCell | undefined,
  options: ExtractionOptions
): RowOutcome {
  const rawExpiry = readRole(row, 'expiry');
  const expiryDate = parseDate(rawExpiry, options.dayFirst ?? true);

  if (!expiryDate) {
    const shown = cellToString(rawExpiry ?? null).trim();
    return {
      ok: false,
      failure: {
        rowNumber,
        reason: shown ? `Unparseable expiry date: "${shown}"` : 'Missing expiry date',
      },
    };
  }

  const text = (role: ColumnRole) => sanitizeHeaderValue(cellToString(readRole(row, role)));

  const rowEmail = sanitizeEmail(cellToString(readRole(row, 'email')));
  const defaultRecipient = options.defaultRecipient?.trim() ?? '';
  const email = rowEmail || defaultRecipient;

  if (!email) {
    return {
      ok: false,
      failure: { rowNumber, reason: 'No email in row and no default recipient configured' },
    };
  }

  const name = text('name');
  const displayName = baseName(text('file')) || name || rowEmail || UNNAMED_AGREEMENT;

  const agreement: Agreement = {
    displayName,
    expiryDate,
    email,
    usesDefaultRecipient: !rowEmail,
    name,
    service: text('service'),
    business: text('business'),
    attachmentPath: text('path'),
    rowNumber,
  };

  return { ok: true, agreement: Object.freeze(agreement) };
}

/**
 * Turn the data rows of a headered table into agreements.
 * Rows with an unusable expiry date or no recipient are reported, not thrown.
 */
export function extractAgreements(
  table: HeaderedTable,
  roleMap: ColumnRoleMap,
  options: ExtractionOptions = {}
): ExtractionResult {
  requireExpiryColumn(roleMap, table.columns);

  const columnIndex = new Map(table.columns.map((name, index) => [name, index]));
  const readRole = (row: RawCell[], role: ColumnRole): RawCell | undefined => {
    const column = roleMap[role];
    if (column === undefined) return undefined;
    const index = columnIndex.get(column);
    return index === undefined ? undefined : row[index];
  };

  const agreements: Readonly<Agreement>[] = [];
  const failures: RowFailure[] = [];

  table.rows.forEach((row, offset) => {
    if (isBlankRow(row)) return;

    // header is row headerIndex + 1 in 1-based numbering
    const rowNumber = table.headerIndex + offset + 2;
    const outcome = extractRow(row, rowNumber, readRole, options);
    if (outcome.ok) {
      agreements.push(outcome.agreement);
    } else {
      failures.push(outcome.failure);
    }
  });

  if (failures.length > 0) {
    logger.warn('Skipped rows during extraction', {
      skipped: failures.length,
      rows: failures.map((failure) => failure.rowNumber),
    });
  }

  logger.info('Extracted agreements', {
    agreements: agreements.length,
    skipped: failures.length,
  });

  return {
    agreements,
    failures,
    roleMap,
    headerIndex: table.headerIndex,
  };
}

/**
 * Header detection, column classification and extraction over a raw sheet
 * @throws ParsingError for an empty sheet, MissingColumnError without an expiry column
 */
export function loadAgreements(rows: RawTable, options: LoadOptions = {}): ExtractionResult {
  if (rows.length === 0) {
    throw new ParsingError('Spreadsheet contains no rows');
  }

  const header = locateHeader(rows, {
    maxScan: options.maxHeaderScan,
    tokens: options.headerTokens,
  });
  const table = toHeaderedTable(rows, header.index);
  const roleMap = classifyColumns(table.columns, options.columnKeywords);

  logger.info('Detected columns', {
    headerIndex: header.index,
    headerConfident: header.confident,
    roles: roleMap,
  });

  requireExpiryColumn(roleMap, table.columns);

  const missing = missingOptionalRoles(roleMap);
  if (missing.includes('email')) {
    logger.warn('No email column detected; default recipients will be used');
  }
  if (missing.length > 0) {
    logger.warn('Optional columns not found', { roles: missing });
  }

  return extractAgreements(table, roleMap, options);
}
