import { format, startOfDay } from 'date-fns';
import { loadAgreements } from './agreement-extractor.js';
import { DedupLedger, ledgerKey, type LedgerStore } from './dedup-ledger.js';
import { composeConfirmation, composeReminder, type ComposeOptions } from './message-composer.js';
import { classifyReminder, reminderTag } from './reminder-classifier.js';
import { decodeTable } from '../parsers/index.js';
import type { BaseSource } from '../sources/base-source.js';
import type { NotificationDispatcher } from '../services/mail-dispatcher.js';
import { processSequentially } from '../utils/batch-processor.js';
import { DispatchError, LedgerError, handleError } from '../utils/error-handler.js';
import { createChildLogger } from '../utils/logger.js';
import type { Agreement, AppConfig, RunSummary } from '../types/index.js';

export interface PipelineDependencies {
  source: BaseSource;
  dispatcher: NotificationDispatcher;
  ledgerStore: LedgerStore;
}

export interface PipelineOptions {
  /** Clock for the run; decides "today" and the due-today window */
  now?: Date;
  /** Compose and log reminders without sending or touching the ledger */
  dryRun?: boolean;
  /** Overrides config.source.documentId */
  identifier?: string;
}

export type AgreementOutcome = 'not_due' | 'already_sent' | 'sent' | 'dry_run';

export const CONFIRMATION_TAG = 'confirmation';

/**
 * Expired notices keep matching their key for notifyExpiredWithinDays after
 * expiry, so those keys must outlive the configured retention.
 */
export function effectiveRetentionDays(config: AppConfig): number {
  return Math.max(config.ledger.retentionDays, config.reminders.notifyExpiredWithinDays + 1);
}

function describeAgreement(agreement: Agreement): string {
  return `${agreement.displayName} (row ${agreement.rowNumber})`;
}

/**
 * One full reminder run over the current spreadsheet snapshot.
 *
 * Source, decode, missing-expiry-column and ledger-write errors abort the run.
 * A failed send is recorded in the summary and the next agreement proceeds.
 */
export async function runReminderPipeline(
  config: AppConfig,
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): Promise<RunSummary> {
  const now = options.now ?? new Date();
  const today = startOfDay(now);
  const todayLabel = format(today, 'yyyy-MM-dd');
  const dryRun = options.dryRun ?? false;
  const log = createChildLogger({ run: todayLabel, dryRun });

  const identifier = options.identifier ?? config.source.documentId;
  log.info('Starting reminder run', { source: deps.source.name, identifier });

  const { buffer, filename } = await deps.source.fetch(identifier);
  const rows = await decodeTable(buffer, filename, { sheetName: config.source.sheetName });

  const extraction = loadAgreements(rows, {
    maxHeaderScan: config.table.maxHeaderScan,
    headerTokens: config.table.headerTokens,
    columnKeywords: config.table.columnKeywords,
    dayFirst: config.table.dayFirst,
    defaultRecipient: config.mail.defaultRecipients[0],
  });

  const ledger = await DedupLedger.load(deps.ledgerStore, {
    today,
    retentionDays: effectiveRetentionDays(config),
  });

  const composeOptions: ComposeOptions = {
    sender: config.mail.sender,
    signature: config.mail.signature,
    defaultRecipients: config.mail.defaultRecipients,
  };

  const remind = async (agreement: Readonly<Agreement>): Promise<AgreementOutcome> => {
    const bucket = classifyReminder(agreement.expiryDate, today, config.reminders);
    const tag = reminderTag(bucket, now, config.reminders);
    if (!tag) return 'not_due';

    const key = ledgerKey(agreement.email, agreement.expiryDate, tag);
    if (ledger.alreadySent(key)) {
      log.debug('Reminder already sent', { key });
      return 'already_sent';
    }

    const message = composeReminder(agreement, bucket, composeOptions);
    if (dryRun) {
      log.info('Dry run: reminder not sent', {
        key,
        recipients: message.recipients,
        subject: message.subject,
      });
      return 'dry_run';
    }

    const result = await deps.dispatcher.send(message);
    if (!result.ok) {
      throw new DispatchError(`Send failed (${result.kind}): ${result.error}`, {
        kind: result.kind,
        key,
      });
    }

    // Only a delivered reminder is recorded
    await ledger.markSent(key);
    return 'sent';
  };

  const { results, errors } = await processSequentially(extraction.agreements, remind, {
    identify: describeAgreement,
    isFatal: (error) => error instanceof LedgerError,
    onProgress: (processed, total) => log.debug('Agreements processed', { processed, total }),
  });

  const count = (outcome: AgreementOutcome) => results.filter((result) => result === outcome).length;

  const summary: RunSummary = {
    today: todayLabel,
    dryRun,
    agreements: extraction.agreements.length,
    skippedRows: extraction.failures.length,
    rowFailures: extraction.failures,
    due: results.length - count('not_due') + errors.length,
    sent: count('sent'),
    alreadySent: count('already_sent'),
    failures: errors,
  };

  if (config.mail.sendConfirmation && !dryRun) {
    await sendConfirmation(summary, config, deps.dispatcher, ledger, today, composeOptions);
  }

  log.info('Reminder run complete', {
    agreements: summary.agreements,
    skippedRows: summary.skippedRows,
    due: summary.due,
    sent: summary.sent,
    alreadySent: summary.alreadySent,
    failed: summary.failures.length,
  });

  return summary;
}

async function sendConfirmation(
  summary: RunSummary,
  config: AppConfig,
  dispatcher: NotificationDispatcher,
  ledger: DedupLedger,
  today: Date,
  composeOptions: ComposeOptions
): Promise<void> {
  const key = ledgerKey(config.mail.sender || 'confirmation', today, CONFIRMATION_TAG);
  if (ledger.alreadySent(key)) return;

  const result = await dispatcher.send(composeConfirmation(summary, composeOptions));
  if (result.ok) {
    await ledger.markSent(key);
    return;
  }

  summary.failures.push(
    handleError(new DispatchError(`Confirmation failed (${result.kind}): ${result.error}`), 'confirmation')
  );
}
