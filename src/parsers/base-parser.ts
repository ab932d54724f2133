import type { RawCell, RawTable } from "../types/index.js";

export type ContainerFormat = "xlsx" | "xls";

export interface TableParseOptions {
  /** Sheet to read; the first sheet when omitted */
  sheetName?: string;
}

/**
 * Abstract base class for table decoders
 * All parsers must implement the parse method
 */
export abstract class BaseTableParser {
  /**
   * File extensions this parser can handle
   */
  abstract readonly supportedExtensions: string[];

  /**
   * Decode a table-structured file into raw rows
   * @param filename - Original filename (used for format hints and logs)
   */
  abstract parse(
    buffer: Buffer,
    filename?: string,
    options?: TableParseOptions,
  ): Promise<RawTable>;

  /**
   * Check if this parser can handle the given file extension
   */
  canParseExtension(filename: string): boolean {
    const ext = filename.toLowerCase().split(".").pop() || "";
    return this.supportedExtensions.includes(ext);
  }

  /**
   * Coerce a decoded cell into the RawCell union
   */
  protected toRawCell(value: unknown): RawCell {
    if (value === undefined || value === null) return null;
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean" ||
      value instanceof Date
    ) {
      return value;
    }
    return String(value);
  }
}

const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];
const OLE2_MAGIC = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

function startsWith(buffer: Buffer, magic: number[]): boolean {
  return (
    buffer.length >= magic.length &&
    magic.every((byte, index) => buffer[index] === byte)
  );
}

/**
 * Identify the spreadsheet container by its magic bytes.
 * Returns null for anything else (HTML error pages, empty downloads, text).
 */
export function detectContainerFormat(buffer: Buffer): ContainerFormat | null {
  if (startsWith(buffer, ZIP_MAGIC)) return "xlsx";
  if (startsWith(buffer, OLE2_MAGIC)) return "xls";
  return null;
}

/**
 * Text formats skip the container check
 */
export function isDelimitedTextFile(filename?: string): boolean {
  if (!filename) return false;
  const ext = filename.toLowerCase().split(".").pop() || "";
  return ext === "csv" || ext === "tsv" || ext === "txt";
}
