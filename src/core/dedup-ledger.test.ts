import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DedupLedger, JsonFileLedgerStore, ledgerKey, MemoryLedgerStore } from './dedup-ledger.js';
import { LedgerError } from '../utils/error-handler.js';

describe('ledgerKey', () => {
  it('combines recipient, expiry date and tag', () => {
    expect(ledgerKey('Ops@Acme.test', new Date(2024, 5, 4), 'pre_3')).toBe('ops@acme.test|2024-06-04|pre_3');
  });
});

describe('DedupLedger', () => {
  const key = ledgerKey('ops@acme.test', new Date(2024, 5, 4), 'pre_3');

  it('remembers marked keys and persists after each mark', async () => {
    const store = new MemoryLedgerStore();
    const ledger = await DedupLedger.load(store);

    expect(ledger.alreadySent(key)).toBe(false);

    await ledger.markSent(key);

    expect(ledger.alreadySent(key)).toBe(true);
    expect(store.entries).toEqual({ [key]: true });
    expect(store.saves).toBe(1);
  });

  it('sees marks from a previous run', async () => {
    const store = new MemoryLedgerStore();
    await (await DedupLedger.load(store)).markSent(key);

    const nextRun = await DedupLedger.load(store);

    expect(nextRun.alreadySent(key)).toBe(true);
  });

  it('treats false entries as not sent', async () => {
    const ledger = await DedupLedger.load(new MemoryLedgerStore({ [key]: false }));

    expect(ledger.alreadySent(key)).toBe(false);
  });

  it('prunes entries older than the retention window', async () => {
    const store = new MemoryLedgerStore({
      'a@x.test|2024-01-01|pre_1': true,
      'a@x.test|2024-05-30|pre_2': true,
    });

    const ledger = await DedupLedger.load(store, { today: new Date(2024, 5, 1), retentionDays: 30 });

    expect(ledger.keys()).toEqual(['a@x.test|2024-05-30|pre_2']);
    expect(ledger.size).toBe(1);
  });
});

describe('JsonFileLedgerStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-'));
    filePath = join(dir, 'nested', 'sent.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    expect(await new JsonFileLedgerStore(filePath).load()).toEqual({});
  });

  it('writes and reads back the whole map', async () => {
    const store = new JsonFileLedgerStore(filePath);

    await store.save({ 'a@x.test|2024-06-04|pre_3': true });

    expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual({ 'a@x.test|2024-06-04|pre_3': true });
    expect(await store.load()).toEqual({ 'a@x.test|2024-06-04|pre_3': true });
  });

  it('rejects a file that is not JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, 'not json');

    await expect(new JsonFileLedgerStore(path).load()).rejects.toBeInstanceOf(LedgerError);
  });

  it('rejects values that are not booleans', async () => {
    const path = join(dir, 'wrong.json');
    await writeFile(path, JSON.stringify({ key: 'yes' }));

    await expect(new JsonFileLedgerStore(path).load()).rejects.toThrow('Ledger file must map keys to booleans');
  });
});
