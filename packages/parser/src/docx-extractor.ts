import type { IExtractor } from "./parser.interface.js";

/**
 * DOCX raw text via mammoth. mammoth separates paragraphs with blank lines;
 * these are collapsed to single newlines.
 */
export class DocxExtractor implements IExtractor {
  readonly fileTypes = ["docx"] as const;

  async extract(filePath: string): Promise<string> {
    const mammoth = await import("mammoth");
    const result = await mammoth.extractRawText({ path: filePath });
    return result.value
      .split("\n\n")
      .map((paragraph) => paragraph.trim())
      .filter((paragraph) => paragraph.length > 0)
      .join("\n");
  }
}
