import { randomUUID } from "node:crypto";
import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { AppError, ExtractionError, errorMessage } from "@docboard/errors";
import type { Logger } from "@docboard/logger";
import type { IExtractor } from "./parser.interface.js";
import { getExtractor, defaultExtractors } from "./factory.js";

/** The slice of the object store extraction needs. */
export interface FileDownloader {
  downloadToFile(key: string, destination: string): Promise<number>;
}

export interface ExtractTextOptions {
  downloader: FileDownloader;
  tmpDir?: string;
  extractors?: readonly IExtractor[];
  logger?: Pick<Logger, "debug">;
}

/**
 * Download a stored object to a temporary file and extract its text.
 *
 * Unsupported types and unreadable content raise ExtractionError; storage
 * failures propagate as they are. The temporary file is always removed.
 */
export async function extractText(
  storageKey: string,
  fileType: string,
  options: ExtractTextOptions,
): Promise<string> {
  const extractor = getExtractor(fileType, options.extractors ?? defaultExtractors);
  const tempPath = path.join(options.tmpDir ?? tmpdir(), `extract-${randomUUID()}.${fileType}`);

  try {
    const bytes = await options.downloader.downloadToFile(storageKey, tempPath);

    let text: string;
    try {
      text = await extractor.extract(tempPath);
    } catch (err) {
      if (AppError.isAppError(err)) throw err;
      throw new ExtractionError(`Failed to extract ${fileType} text from ${storageKey}: ${errorMessage(err)}`, fileType, {
        cause: err,
      });
    }

    options.logger?.debug({ storageKey, fileType, bytes, chars: text.length }, "Text extracted");
    return text;
  } finally {
    await rm(tempPath, { force: true });
  }
}
