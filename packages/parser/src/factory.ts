import { ExtractionError } from "@docboard/errors";
import type { IExtractor } from "./parser.interface.js";
import { PdfExtractor } from "./pdf-extractor.js";
import { DocxExtractor } from "./docx-extractor.js";
import { TextExtractor } from "./text-extractor.js";

export const defaultExtractors: readonly IExtractor[] = [
  new PdfExtractor(),
  new DocxExtractor(),
  new TextExtractor(),
];

/**
 * Select the extractor for a file type. Stored-only types (xlsx, pptx) have none.
 */
export function getExtractor(
  fileType: string,
  extractors: readonly IExtractor[] = defaultExtractors,
): IExtractor {
  const extractor = extractors.find((e) => e.fileTypes.some((t) => t === fileType));

  if (!extractor) {
    throw new ExtractionError(`Unsupported file type for extraction: ${fileType}`, fileType);
  }

  return extractor;
}
