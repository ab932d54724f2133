import { mkdir, writeFile } from "fs/promises";
import { basename, dirname } from "path";
import pRetry from "p-retry";
import { BaseSource, type FetchedTable } from "./base-source.js";
import { logger } from "../utils/logger.js";
import { SourceError, isRetryableError } from "../utils/error-handler.js";

export interface DriveSourceOptions {
  /** Where the downloaded bytes are kept for inspection and reruns */
  cachePath: string;
  retryAttempts: number;
  retryDelayMs: number;
  fetchImpl?: typeof fetch;
}

const DRIVE_DOWNLOAD_URL = "https://drive.google.com/uc";

/**
 * Turn a Drive file id, Drive share link or Sheets link into a direct download URL.
 * Other http(s) URLs are downloaded as they are.
 */
export function resolveDownloadUrl(identifier: string): string {
  const trimmed = identifier.trim();

  if (!/^https?:\/\//i.test(trimmed)) {
    return `${DRIVE_DOWNLOAD_URL}?id=${encodeURIComponent(trimmed)}&export=download`;
  }

  const sheet = trimmed.match(/docs\.google\.com\/spreadsheets\/d\/([\w-]+)/);
  if (sheet) {
    return `https://docs.google.com/spreadsheets/d/${sheet[1]}/export?format=xlsx`;
  }

  if (/drive\.google\.com/i.test(trimmed)) {
    const fileId =
      trimmed.match(/\/file\/d\/([\w-]+)/)?.[1] ??
      new URL(trimmed).searchParams.get("id");
    if (fileId) {
      return `${DRIVE_DOWNLOAD_URL}?id=${encodeURIComponent(fileId)}&export=download`;
    }
  }

  return trimmed;
}

/**
 * Drive answers large downloads with a "can't scan for viruses" page whose form
 * carries the confirmation parameters. Rebuild the download URL from that form.
 */
export function findConfirmationUrl(html: string, originalUrl: string): string | null {
  const action = html.match(/<form[^>]+action="([^"]+)"/i)?.[1];
  if (action) {
    const url = new URL(action.replace(/&amp;/g, "&"), originalUrl);
    const inputs = html.matchAll(
      /<input[^>]+name="([^"]+)"[^>]+value="([^"]*)"/gi,
    );
    for (const [, name, value] of inputs) {
      url.searchParams.set(name, value);
    }
    if (url.searchParams.has("confirm")) {
      return url.toString();
    }
  }

  const token = html.match(/confirm=([0-9A-Za-z_-]+)/)?.[1];
  if (token) {
    const url = new URL(originalUrl);
    url.searchParams.set("confirm", token);
    return url.toString();
  }

  return null;
}

export class DriveSource extends BaseSource {
  readonly name = "Google Drive";

  private readonly options: DriveSourceOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DriveSourceOptions) {
    super();
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(identifier: string): Promise<FetchedTable> {
    if (!identifier.trim()) {
      throw new SourceError("No source document identifier configured");
    }

    const url = resolveDownloadUrl(identifier);
    const filename = basename(this.options.cachePath);

    logger.info("Downloading spreadsheet", { url, dest: this.options.cachePath });

    const buffer = await pRetry(() => this.download(url, true), {
      retries: this.options.retryAttempts,
      minTimeout: this.options.retryDelayMs,
      onFailedAttempt: (error) => {
        if (!isRetryableError(error)) {
          throw error;
        }
        logger.warn("Retrying spreadsheet download", {
          url,
          attempt: error.attemptNumber,
          retriesLeft: error.retriesLeft,
        });
      },
    });

    this.assertSpreadsheet(buffer, filename);

    await mkdir(dirname(this.options.cachePath), { recursive: true });
    await writeFile(this.options.cachePath, buffer);

    logger.info("Download complete", { size: buffer.length });

    return { buffer, filename };
  }

  private async download(url: string, allowConfirmation: boolean): Promise<Buffer> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { redirect: "follow" });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SourceError(`Network error while downloading: ${message}`, { url });
    }

    if (!response.ok) {
      throw new SourceError(`Download failed with status ${response.status}`, {
        url,
        status: response.status,
      });
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (contentType.includes("text/html")) {
      const html = await response.text();
      const confirmUrl = allowConfirmation ? findConfirmationUrl(html, url) : null;
      if (!confirmUrl) {
        throw new SourceError(
          "Download returned an HTML page instead of a spreadsheet; check the file is shared publicly",
          { url },
        );
      }
      logger.debug("Following download confirmation", { confirmUrl });
      return this.download(confirmUrl, false);
    }

    return Buffer.from(await response.arrayBuffer());
  }
}
