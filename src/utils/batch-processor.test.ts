import { describe, it, expect, vi } from 'vitest';
import { processSequentially } from './batch-processor.js';
import { LedgerError } from './error-handler.js';

describe('processSequentially', () => {
  it('keeps going after a failing item', async () => {
    const { results, errors } = await processSequentially([1, 2, 3], async (n) => {
      if (n === 2) throw new Error('boom');
      return n * 10;
    });

    expect(results).toEqual([10, 30]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ identifier: 'item-1', error: 'boom' });
  });

  it('labels failures with the identify callback', async () => {
    const { errors } = await processSequentially(
      [{ label: 'Acme' }],
      async () => {
        throw new Error('send failed');
      },
      { identify: (item) => item.label }
    );

    expect(errors[0].identifier).toBe('Acme');
  });

  it('rethrows errors marked fatal', async () => {
    const processor = vi.fn(async (n: number) => {
      if (n === 1) throw new LedgerError('disk full');
      return n;
    });

    await expect(
      processSequentially([1, 2], processor, { isFatal: (error) => error instanceof LedgerError })
    ).rejects.toThrow('disk full');
    expect(processor).toHaveBeenCalledTimes(1);
  });

  it('processes items in order and reports progress', async () => {
    const seen: number[] = [];
    const progress: Array<[number, number]> = [];

    await processSequentially(
      [3, 1, 2],
      async (n) => {
        seen.push(n);
        return n;
      },
      { onProgress: (processed, total) => progress.push([processed, total]) }
    );

    expect(seen).toEqual([3, 1, 2]);
    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });
});
