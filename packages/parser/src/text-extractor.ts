import { readFile } from "node:fs/promises";
import type { IExtractor } from "./parser.interface.js";

/** UTF-8 text; invalid byte sequences decode to U+FFFD. */
export class TextExtractor implements IExtractor {
  readonly fileTypes = ["txt"] as const;

  async extract(filePath: string): Promise<string> {
    const bytes = await readFile(filePath);
    return new TextDecoder("utf-8").decode(bytes);
  }
}
