import { detectContainerFormat, isDelimitedTextFile } from "../parsers/index.js";
import { SourceError } from "../utils/error-handler.js";

export interface FetchedTable {
  buffer: Buffer;
  /** Name used for format detection by the table decoder */
  filename: string;
}

/**
 * Abstract base class for spreadsheet sources
 * All sources must implement the fetch method
 */
export abstract class BaseSource {
  /**
   * Human-readable name of the source
   */
  abstract readonly name: string;

  /**
   * Retrieve the spreadsheet bytes for an identifier
   * @param identifier - Document id, URL, or path, depending on the source
   * @throws SourceError when the file cannot be retrieved or is not a spreadsheet
   */
  abstract fetch(identifier: string): Promise<FetchedTable>;

  /**
   * Reject blobs that are not a spreadsheet container
   */
  protected assertSpreadsheet(buffer: Buffer, filename: string): void {
    if (buffer.length === 0) {
      throw new SourceError("Retrieved file is empty", { filename });
    }
    if (isDelimitedTextFile(filename)) return;

    if (!detectContainerFormat(buffer)) {
      const preview = buffer.subarray(0, 16).toString("hex");
      throw new SourceError(
        "Retrieved file is not a spreadsheet (unexpected magic bytes)",
        { filename, preview },
      );
    }
  }
}
