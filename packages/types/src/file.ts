import type { MetadataMap } from "./json.js";

export type FileProcessingStatus = "pending" | "processing" | "completed" | "failed";

/** File types the extraction engine understands, plus the office formats that are stored only. */
export type FileType = "pdf" | "docx" | "txt" | "xlsx" | "pptx";

export interface DocumentFile {
  id: string;
  /** Null only for files accepted through the sync-mode fallback when the document did not resolve. */
  documentId: string | null;
  storageKey: string;
  originalName: string;
  fileType: FileType;
  fileSize: number;
  contentType: string;
  processingStatus: FileProcessingStatus;
  metadata: MetadataMap;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewDocumentFile {
  id?: string;
  documentId: string | null;
  storageKey: string;
  originalName: string;
  fileType: FileType;
  fileSize: number;
  contentType: string;
  processingStatus?: FileProcessingStatus;
  metadata?: MetadataMap;
}

export type DocumentFilePatch = Partial<
  Pick<DocumentFile, "processingStatus" | "metadata" | "errorMessage" | "fileSize" | "contentType">
>;

/** One uploaded file as handed over by the request layer. */
export interface IncomingFile {
  originalName: string;
  content: Buffer;
}

export interface FileAcceptResult {
  fileId: string;
  storageKey: string;
  originalName: string;
  status: FileProcessingStatus;
  taskId: string | null;
  error: string | null;
}
