export type { IExtractor } from "./parser.interface.js";
export { PdfExtractor } from "./pdf-extractor.js";
export { DocxExtractor } from "./docx-extractor.js";
export { TextExtractor } from "./text-extractor.js";
export { getExtractor, defaultExtractors } from "./factory.js";
export { extractText } from "./extract-text.js";
export type { ExtractTextOptions, FileDownloader } from "./extract-text.js";
