import { logger } from './logger.js';
import { handleError } from './error-handler.js';
import type { RunFailure } from '../types/index.js';

export interface BatchProcessorOptions<T> {
  /** Label used in failure records and logs */
  identify?: (item: T, index: number) => string;
  /** Errors that must abort the whole batch instead of being recorded */
  isFatal?: (error: unknown) => boolean;
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Run `processor` over the items one at a time. A failing item is logged and
 * recorded, and the remaining items still run.
 */
export async function processSequentially<T, R>(
  items: readonly T[],
  processor: (item: T) => Promise<R>,
  options: BatchProcessorOptions<T> = {}
): Promise<{ results: R[]; errors: RunFailure[] }> {
  const results: R[] = [];
  const errors: RunFailure[] = [];
  let processed = 0;

  logger.debug('Starting batch processing', { totalItems: items.length });

  for (const [index, item] of items.entries()) {
    const itemId = options.identify?.(item, index) ?? getItemIdentifier(item, index);
    try {
      results.push(await processor(item));
    } catch (error) {
      if (options.isFatal?.(error)) {
        throw error;
      }
      errors.push(handleError(error, itemId));
    } finally {
      processed++;
      options.onProgress?.(processed, items.length);
    }
  }

  logger.debug('Batch processing complete', {
    total: items.length,
    successful: results.length,
    failed: errors.length,
  });

  return { results, errors };
}

function getItemIdentifier(item: unknown, index: number): string {
  if (typeof item === 'object' && item !== null) {
    if ('id' in item && typeof item.id === 'string') return item.id;
    if ('name' in item && typeof item.name === 'string') return item.name;
  }
  return `item-${index}`;
}
