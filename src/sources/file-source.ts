import { readFile } from "fs/promises";
import { basename, isAbsolute, join } from "path";
import { BaseSource, type FetchedTable } from "./base-source.js";
import { logger } from "../utils/logger.js";
import { SourceError, getErrorMessage } from "../utils/error-handler.js";

export class FileSource extends BaseSource {
  readonly name = "Local File System";

  private basePath: string;

  constructor(basePath: string = process.cwd()) {
    super();
    this.basePath = basePath;
  }

  async fetch(filePath: string): Promise<FetchedTable> {
    const fullPath = isAbsolute(filePath)
      ? filePath
      : join(this.basePath, filePath);

    let buffer: Buffer;
    try {
      buffer = await readFile(fullPath);
    } catch (error) {
      throw new SourceError(`Failed to read file: ${getErrorMessage(error)}`, {
        path: fullPath,
      });
    }

    const filename = basename(fullPath);
    this.assertSpreadsheet(buffer, filename);

    logger.debug("Read spreadsheet file", {
      path: fullPath,
      size: buffer.length,
    });

    return { buffer, filename };
  }
}
