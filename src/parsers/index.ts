import { BaseTableParser, type TableParseOptions } from './base-parser.js';
import { XlsxParser } from './xlsx-parser.js';
import { logger } from '../utils/logger.js';
import type { RawTable } from '../types/index.js';

const parsers: BaseTableParser[] = [new XlsxParser()];

const defaultParser = parsers[0];

/**
 * Get the parser for a filename, or the spreadsheet parser when the name gives no hint
 */
export function getParser(filename?: string): BaseTableParser {
  if (filename) {
    for (const parser of parsers) {
      if (parser.canParseExtension(filename)) {
        return parser;
      }
    }
  }
  return defaultParser;
}

/**
 * Decode downloaded bytes into a raw table
 */
export async function decodeTable(
  buffer: Buffer,
  filename?: string,
  options: TableParseOptions = {}
): Promise<RawTable> {
  const parser = getParser(filename);

  logger.debug('Selected parser', {
    parser: parser.constructor.name,
    filename,
  });

  return parser.parse(buffer, filename, options);
}

export { BaseTableParser, type TableParseOptions };
export { XlsxParser } from './xlsx-parser.js';
export { detectContainerFormat, isDelimitedTextFile, type ContainerFormat } from './base-parser.js';
