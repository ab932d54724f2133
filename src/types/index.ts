/**
 * Core type definitions for the agreement reminder pipeline
 */

export type RawCell = string | number | boolean | Date | null;

/** Decoded sheet rows, header position unknown */
export type RawTable = RawCell[][];

export type ColumnRole =
  | 'expiry'
  | 'email'
  | 'name'
  | 'file'
  | 'path'
  | 'service'
  | 'business';

export type ColumnKeywords = Record<ColumnRole, string[]>;

/** Role → column name, for the roles that matched a column */
export type ColumnRoleMap = Partial<Record<ColumnRole, string>>;

export interface HeaderLocation {
  index: number;
  /** false when no row in the scan window looked like a header */
  confident: boolean;
}

export interface HeaderedTable {
  columns: string[];
  rows: RawTable;
  /** Index of the header row inside the raw table */
  headerIndex: number;
}

export interface Agreement {
  displayName: string;
  expiryDate: Date;
  email: string;
  usesDefaultRecipient: boolean;
  name: string;
  service: string;
  business: string;
  attachmentPath: string;
  /** 1-based row number in the sheet */
  rowNumber: number;
}

export interface RowFailure {
  rowNumber: number;
  reason: string;
}

export type RowOutcome =
  | { ok: true; agreement: Readonly<Agreement> }
  | { ok: false; failure: RowFailure };

export interface ExtractionResult {
  agreements: ReadonlyArray<Readonly<Agreement>>;
  failures: RowFailure[];
  roleMap: ColumnRoleMap;
  headerIndex: number;
}

export type ReminderBucket =
  | { kind: 'none' }
  | { kind: 'pre_reminder'; daysLeft: number }
  | { kind: 'due_today' }
  | { kind: 'expired'; daysOverdue: number };

export type DueTodayPolicy = 'once' | 'windows';

export interface ReminderPolicy {
  preReminderDays: number;
  dueToday: DueTodayPolicy;
  /** Hour (0-23) from which a due-today send counts as the evening window */
  eveningStartHour: number;
  /** 0 disables reminders for already expired agreements */
  notifyExpiredWithinDays: number;
}

export interface OutgoingMessage {
  sender: string;
  recipients: string[];
  subject: string;
  body: string;
  attachmentPath?: string;
}

export type DispatchFailureKind = 'auth' | 'transport' | 'config';

export type DispatchResult =
  | { ok: true; messageId: string }
  | { ok: false; kind: DispatchFailureKind; error: string };

export interface RunFailure {
  identifier: string;
  error: string;
  timestamp: Date;
}

export interface RunSummary {
  today: string;
  dryRun: boolean;
  agreements: number;
  skippedRows: number;
  rowFailures: RowFailure[];
  /** Agreements that fell into a reminder bucket today */
  due: number;
  sent: number;
  alreadySent: number;
  failures: RunFailure[];
}

export interface AppConfig {
  mail: {
    sender: string;
    password: string;
    defaultRecipients: string[];
    signature: string;
    sendConfirmation: boolean;
  };
  smtp: {
    host: string;
    port: number;
    retryAttempts: number;
    retryDelayMs: number;
  };
  source: {
    documentId: string;
    cachePath: string;
    sheetName?: string;
    retryAttempts: number;
    retryDelayMs: number;
  };
  table: {
    maxHeaderScan: number;
    dayFirst: boolean;
    headerTokens: string[];
    columnKeywords: ColumnKeywords;
  };
  reminders: ReminderPolicy;
  ledger: {
    path: string;
    retentionDays: number;
  };
  logging: {
    level: string;
    format: string;
    file?: string;
  };
}
