import { logger } from './logger.js';
import type { RunFailure } from '../types/index.js';

export class ReminderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReminderError';
  }
}

/** Spreadsheet could not be retrieved, or the retrieved blob is not a spreadsheet */
export class SourceError extends ReminderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', context);
    this.name = 'SourceError';
  }
}

export class ParsingError extends ReminderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PARSING_ERROR', context);
    this.name = 'ParsingError';
  }
}

export class MissingColumnError extends ReminderError {
  constructor(role: string, columns: string[]) {
    super(`Missing required column: no column matches the "${role}" role`, 'MISSING_COLUMN', {
      role,
      columns,
    });
    this.name = 'MissingColumnError';
  }
}

export class LedgerError extends ReminderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LEDGER_ERROR', context);
    this.name = 'LedgerError';
  }
}

export class DispatchError extends ReminderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DISPATCH_ERROR', context);
    this.name = 'DispatchError';
  }
}

export class ConfigError extends ReminderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * Read the `code` property that Node and nodemailer attach to their errors
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function handleError(error: unknown, identifier?: string): RunFailure {
  const errorMessage = getErrorMessage(error);
  const errorDetails = error instanceof ReminderError ? error.context : undefined;

  logger.error('Reminder processing failed', {
    identifier,
    error: errorMessage,
    details: errorDetails,
  });

  return {
    identifier: identifier || 'unknown',
    error: errorMessage,
    timestamp: new Date(),
  };
}

const TRANSIENT_CODES = new Set([
  'ECONNECTION',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ESOCKET',
  'EAI_AGAIN',
]);

export function isRetryableError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code === 'EAUTH') {
    return false;
  }
  if (code && TRANSIENT_CODES.has(code)) {
    return true;
  }
  if (error instanceof SourceError) {
    const message = error.message.toLowerCase();
    return message.includes('network') || message.includes('timeout') || message.includes('status 5');
  }
  const message = getErrorMessage(error).toLowerCase();
  return message.includes('timeout') || message.includes('fetch failed');
}
