import { BaseSource, type FetchedTable } from "./base-source.js";
import { DriveSource } from "./drive-source.js";
import { FileSource } from "./file-source.js";
import type { AppConfig } from "../types/index.js";

export { BaseSource, type FetchedTable };
export { FileSource } from "./file-source.js";
export {
  DriveSource,
  resolveDownloadUrl,
  findConfirmationUrl,
  type DriveSourceOptions,
} from "./drive-source.js";

export type SourceType = "drive" | "file";

/**
 * Create a source instance by type
 */
export function createSource(type: SourceType, config: AppConfig): BaseSource {
  switch (type) {
    case "file":
      return new FileSource();
    case "drive":
      return new DriveSource({
        cachePath: config.source.cachePath,
        retryAttempts: config.source.retryAttempts,
        retryDelayMs: config.source.retryDelayMs,
      });
    default: {
      const unknownType: never = type;
      throw new Error(`Unknown source type: ${String(unknownType)}`);
    }
  }
}
