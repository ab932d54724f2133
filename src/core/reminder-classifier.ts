import { differenceInCalendarDays } from 'date-fns';
import type { ReminderBucket, ReminderPolicy } from '../types/index.js';

export const DEFAULT_REMINDER_POLICY: ReminderPolicy = {
  preReminderDays: 5,
  dueToday: 'once',
  eveningStartHour: 12,
  notifyExpiredWithinDays: 0,
};

export const NO_REMINDER: ReminderBucket = { kind: 'none' };

/**
 * Whole calendar days from today until expiry; negative once expired
 */
export function daysUntil(expiryDate: Date, today: Date): number {
  return differenceInCalendarDays(expiryDate, today);
}

/**
 * Map an expiry date to today's reminder bucket.
 *
 * - 0 days left: due today
 * - 1..preReminderDays left: pre-reminder carrying the day count
 * - expired: nothing, unless the policy asks for post-expiry notices
 * - further out: nothing
 */
export function classifyReminder(
  expiryDate: Date,
  today: Date,
  policy: ReminderPolicy = DEFAULT_REMINDER_POLICY
): ReminderBucket {
  const daysLeft = daysUntil(expiryDate, today);

  if (daysLeft < 0) {
    const daysOverdue = -daysLeft;
    return daysOverdue <= policy.notifyExpiredWithinDays
      ? { kind: 'expired', daysOverdue }
      : NO_REMINDER;
  }
  if (daysLeft === 0) {
    return { kind: 'due_today' };
  }
  if (daysLeft <= policy.preReminderDays) {
    return { kind: 'pre_reminder', daysLeft };
  }
  return NO_REMINDER;
}

/**
 * Stable ledger tag for a bucket; one tag per distinct notification event.
 * Under the 'windows' policy a due-today reminder fires once in the morning
 * and once in the evening.
 */
export function reminderTag(
  bucket: ReminderBucket,
  now: Date,
  policy: ReminderPolicy = DEFAULT_REMINDER_POLICY
): string | null {
  switch (bucket.kind) {
    case 'none':
      return null;
    case 'pre_reminder':
      return `pre_${bucket.daysLeft}`;
    case 'due_today':
      if (policy.dueToday === 'once') return 'due_today';
      return now.getHours() < policy.eveningStartHour ? 'due_morning' : 'due_evening';
    case 'expired':
      return `expired_${bucket.daysOverdue}`;
  }
}
