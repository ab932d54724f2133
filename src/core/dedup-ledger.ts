import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { format, isValid, parse, subDays } from 'date-fns';
import { z } from 'zod';
import { LedgerError, getErrorCode, getErrorMessage } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export type LedgerEntries = Record<string, boolean>;

/**
 * Durable key → sent-flag storage, read and written as a whole.
 * Runs must be serialized: there is no locking between writers.
 */
export interface LedgerStore {
  load(): Promise<LedgerEntries>;
  save(entries: LedgerEntries): Promise<void>;
}

const ledgerSchema = z.record(z.boolean());

export class JsonFileLedgerStore implements LedgerStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<LedgerEntries> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        logger.info('No ledger file yet; starting empty', { path: this.filePath });
        return {};
      }
      throw new LedgerError(`Failed to read ledger: ${getErrorMessage(error)}`, { path: this.filePath });
    }

    if (!content.trim()) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new LedgerError(`Ledger file is not valid JSON: ${getErrorMessage(error)}`, { path: this.filePath });
    }

    const result = ledgerSchema.safeParse(parsed);
    if (!result.success) {
      throw new LedgerError('Ledger file must map keys to booleans', { path: this.filePath });
    }
    return result.data;
  }

  async save(entries: LedgerEntries): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(entries, null, 2), 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new LedgerError(`Failed to write ledger: ${getErrorMessage(error)}`, { path: this.filePath });
    }
  }
}

export class MemoryLedgerStore implements LedgerStore {
  saves = 0;

  constructor(public entries: LedgerEntries = {}) {}

  async load(): Promise<LedgerEntries> {
    return { ...this.entries };
  }

  async save(entries: LedgerEntries): Promise<void> {
    this.saves++;
    this.entries = { ...entries };
  }
}

const KEY_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Ledger key for one notification event: recipient, expiry date and bucket tag
 */
export function ledgerKey(email: string, expiryDate: Date, tag: string): string {
  return `${email.trim().toLowerCase()}|${format(expiryDate, KEY_DATE_FORMAT)}|${tag}`;
}

function keyDate(key: string): Date | null {
  const datePart = key.split('|')[1];
  if (!datePart) return null;
  const date = parse(datePart, KEY_DATE_FORMAT, new Date());
  return isValid(date) ? date : null;
}

export interface LedgerLoadOptions {
  today?: Date;
  /** Drop entries whose date is more than this many days before today */
  retentionDays?: number;
}

export class DedupLedger {
  private constructor(
    private readonly store: LedgerStore,
    private readonly entries: Map<string, boolean>
  ) {}

  static async load(store: LedgerStore, options: LedgerLoadOptions = {}): Promise<DedupLedger> {
    const stored = await store.load();
    const entries = new Map(Object.entries(stored));

    if (options.retentionDays !== undefined) {
      const cutoff = subDays(options.today ?? new Date(), options.retentionDays);
      let pruned = 0;
      for (const key of [...entries.keys()]) {
        const date = keyDate(key);
        if (date && date < cutoff) {
          entries.delete(key);
          pruned++;
        }
      }
      if (pruned > 0) {
        logger.debug('Pruned old ledger entries', { pruned });
      }
    }

    logger.info('Ledger loaded', { entries: entries.size });
    return new DedupLedger(store, entries);
  }

  alreadySent(key: string): boolean {
    return this.entries.get(key) === true;
  }

  /**
   * Record a successful send and persist the whole ledger
   * @throws LedgerError when the store cannot be written; the mark still holds for this run
   */
  async markSent(key: string): Promise<void> {
    this.entries.set(key, true);
    await this.store.save(Object.fromEntries(this.entries));
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
