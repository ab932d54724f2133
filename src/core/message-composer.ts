import { format } from 'date-fns';
import { sanitizeHeaderValue } from './agreement-extractor.js';
import type { Agreement, OutgoingMessage, ReminderBucket, RunSummary } from '../types/index.js';

export interface ComposeOptions {
  sender: string;
  signature: string;
  defaultRecipients: string[];
}

const DISPLAY_DATE = 'yyyy-MM-dd';

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function describeTiming(bucket: ReminderBucket, expiry: string): string {
  switch (bucket.kind) {
    case 'due_today':
      return `Your agreement expires today (${expiry}). Please take necessary action.`;
    case 'pre_reminder':
      return `Your agreement expires in ${plural(bucket.daysLeft, 'day')} (${expiry}). Please plan the renewal.`;
    case 'expired':
      return `Your agreement expired ${plural(bucket.daysOverdue, 'day')} ago (${expiry}). Please renew it as soon as possible.`;
    case 'none':
      return `Your agreement expires on ${expiry}.`;
  }
}

function subjectFor(bucket: ReminderBucket, displayName: string): string {
  switch (bucket.kind) {
    case 'due_today':
      return `Renewal Reminder: ${displayName} expires today`;
    case 'pre_reminder':
      return `Renewal Reminder: ${displayName} expires in ${plural(bucket.daysLeft, 'day')}`;
    case 'expired':
      return `Renewal Overdue: ${displayName}`;
    case 'none':
      return `Renewal Reminder for ${displayName}`;
  }
}

export function recipientsFor(agreement: Agreement, defaultRecipients: string[]): string[] {
  return agreement.usesDefaultRecipient && defaultRecipients.length > 0
    ? [...defaultRecipients]
    : [agreement.email];
}

/**
 * Build the reminder email for one agreement
 */
export function composeReminder(
  agreement: Agreement,
  bucket: ReminderBucket,
  options: ComposeOptions
): OutgoingMessage {
  const displayName = sanitizeHeaderValue(agreement.displayName);
  const greetingName = agreement.name || 'Client';
  const expiry = format(agreement.expiryDate, DISPLAY_DATE);

  const details = [
    `Agreement: ${displayName}`,
    agreement.service && `Service: ${agreement.service}`,
    agreement.business && `Business: ${agreement.business}`,
    `Expiry date: ${expiry}`,
  ].filter(Boolean);

  const body = [
    `Dear ${greetingName},`,
    '',
    describeTiming(bucket, expiry),
    '',
    ...details,
    '',
    'Regards,',
    options.signature,
  ].join('\n');

  return {
    sender: options.sender,
    recipients: recipientsFor(agreement, options.defaultRecipients),
    subject: subjectFor(bucket, displayName),
    body,
    attachmentPath: agreement.attachmentPath || undefined,
  };
}

/**
 * Daily confirmation that the reminder run happened
 */
export function composeConfirmation(summary: RunSummary, options: ComposeOptions): OutgoingMessage {
  const lines = [
    `Renewal reminder run for ${summary.today} completed.`,
    '',
    `Agreements read: ${summary.agreements}`,
    `Rows skipped: ${summary.skippedRows}`,
    `Reminders due: ${summary.due}`,
    `Reminders sent: ${summary.sent}`,
    `Already sent earlier: ${summary.alreadySent}`,
    `Failures: ${summary.failures.length}`,
  ];

  for (const failure of summary.failures) {
    lines.push(`  - ${failure.identifier}: ${failure.error}`);
  }

  lines.push('', 'Regards,', options.signature);

  return {
    sender: options.sender,
    recipients: [...options.defaultRecipients],
    subject: `Renewal reminder run ${summary.today}`,
    body: lines.join('\n'),
  };
}
