/**
 * Agreement Renewal Reminders
 *
 * Main entry point for programmatic usage.
 * For CLI usage, see the scripts in src/scripts/
 */

// Core exports
export { runReminderPipeline, CONFIRMATION_TAG } from './core/reminder-pipeline.js';
export type { PipelineDependencies, PipelineOptions, AgreementOutcome } from './core/reminder-pipeline.js';
export { locateHeader, DEFAULT_HEADER_TOKENS, DEFAULT_MAX_HEADER_SCAN } from './core/header-locator.js';
export {
  classifyColumns,
  matchColumn,
  requireExpiryColumn,
  COLUMN_ROLES,
  DEFAULT_COLUMN_KEYWORDS,
} from './core/column-classifier.js';
export { parseDate, fromExcelSerial } from './core/date-normalizer.js';
export {
  loadAgreements,
  extractAgreements,
  buildColumnNames,
  toHeaderedTable,
  sanitizeHeaderValue,
  sanitizeEmail,
  UNNAMED_AGREEMENT,
} from './core/agreement-extractor.js';
export { classifyReminder, reminderTag, daysUntil, DEFAULT_REMINDER_POLICY } from './core/reminder-classifier.js';
export { DedupLedger, JsonFileLedgerStore, MemoryLedgerStore, ledgerKey } from './core/dedup-ledger.js';
export type { LedgerStore, LedgerEntries } from './core/dedup-ledger.js';
export { composeReminder, composeConfirmation, recipientsFor } from './core/message-composer.js';

// Parser exports
export { decodeTable, detectContainerFormat } from './parsers/index.js';

// Source exports
export { createSource, BaseSource, FileSource, DriveSource, resolveDownloadUrl } from './sources/index.js';

// Service exports
export { SmtpDispatcher } from './services/mail-dispatcher.js';
export type { NotificationDispatcher, MailTransport } from './services/mail-dispatcher.js';

// Utility exports
export { logger, createChildLogger, configureLogging } from './utils/logger.js';
export { processSequentially } from './utils/batch-processor.js';
export { loadConfig, describeConfigGaps } from './utils/config.js';
export {
  ReminderError,
  SourceError,
  ParsingError,
  MissingColumnError,
  LedgerError,
  DispatchError,
  ConfigError,
  handleError,
  isRetryableError,
} from './utils/error-handler.js';

// Type exports
export type {
  Agreement,
  AppConfig,
  ColumnRole,
  ColumnRoleMap,
  DispatchResult,
  ExtractionResult,
  OutgoingMessage,
  RawCell,
  RawTable,
  ReminderBucket,
  ReminderPolicy,
  RowFailure,
  RunFailure,
  RunSummary,
} from './types/index.js';
