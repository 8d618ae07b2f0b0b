import type { FileType } from "@docboard/types";

/** Reads the text out of a file already on local disk. */
export interface IExtractor {
  readonly fileTypes: readonly FileType[];
  extract(filePath: string): Promise<string>;
}
