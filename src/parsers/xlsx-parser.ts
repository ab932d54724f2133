import * as XLSX from "xlsx";
import {
  BaseTableParser,
  isDelimitedTextFile,
  type TableParseOptions,
} from "./base-parser.js";
import { ParsingError } from "../utils/error-handler.js";
import { logger } from "../utils/logger.js";
import type { RawTable } from "../types/index.js";

export class XlsxParser extends BaseTableParser {
  readonly supportedExtensions = ["xlsx", "xlsm", "xls", "csv"];

  async parse(
    buffer: Buffer,
    filename?: string,
    options: TableParseOptions = {},
  ): Promise<RawTable> {
    try {
      logger.debug("Parsing spreadsheet document", { filename });

      // SheetJS reads date-like CSV text month-first; keep it as text for parseDate
      const workbook = XLSX.read(buffer, {
        type: "buffer",
        raw: isDelimitedTextFile(filename),
      });
      const sheetName = options.sheetName ?? workbook.SheetNames[0];

      if (!sheetName) {
        throw new Error("Workbook contains no sheets");
      }

      const sheet = workbook.Sheets[sheetName];
      if (!sheet) {
        throw new Error(`Sheet not found: ${sheetName}`);
      }

      // header: 1 keeps every row as an array, the header row is located later
      const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: true,
        defval: null,
        blankrows: false,
      });

      const table: RawTable = rows.map((row) =>
        row.map((cell) => this.toRawCell(cell)),
      );

      logger.debug("Decoded sheet", {
        filename,
        sheetName,
        rows: table.length,
      });

      return table;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Failed to parse spreadsheet", { filename, error: message });
      throw new ParsingError(`Failed to parse spreadsheet: ${message}`, {
        filename,
      });
    }
  }
}
