import path from "node:path";
import type { FileType } from "@docboard/types";

const MB = 1024 * 1024;

export interface FileTypeRule {
  fileType: FileType;
  extension: string;
  maxBytes: number;
  contentType: string;
}

/** Accepted uploads. Anything else is rejected before a row or object is written. */
export const FILE_TYPE_RULES: readonly FileTypeRule[] = [
  { fileType: "pdf", extension: ".pdf", maxBytes: 50 * MB, contentType: "application/pdf" },
  {
    fileType: "docx",
    extension: ".docx",
    maxBytes: 30 * MB,
    contentType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  },
  { fileType: "txt", extension: ".txt", maxBytes: 10 * MB, contentType: "text/plain" },
  {
    fileType: "xlsx",
    extension: ".xlsx",
    maxBytes: 30 * MB,
    contentType: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  },
  {
    fileType: "pptx",
    extension: ".pptx",
    maxBytes: 50 * MB,
    contentType: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  },
];

const DEFAULT_CONTENT_TYPE = "application/octet-stream";

/** Lowercased extension including the dot, or "" when there is none. */
export function extensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

export function ruleForName(fileName: string): FileTypeRule | undefined {
  const extension = extensionOf(fileName);
  return FILE_TYPE_RULES.find((rule) => rule.extension === extension);
}

export function contentTypeFor(fileName: string): string {
  return ruleForName(fileName)?.contentType ?? DEFAULT_CONTENT_TYPE;
}
