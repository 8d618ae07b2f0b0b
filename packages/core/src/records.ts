import { NotFoundError } from "@docboard/errors";
import type { DocumentFileRepository, DocumentRepository } from "@docboard/db";
import type {
  Document,
  DocumentFile,
  DocumentFilePatch,
  DocumentPatch,
  FileProcessingStatus,
  MetadataMap,
} from "@docboard/types";
import { assertTransition } from "./file-status.js";
import { mergeMetadata } from "./metadata.js";

export interface FileStatusChange extends Omit<DocumentFilePatch, "processingStatus" | "metadata"> {
  metadata?: MetadataMap;
  administrative?: boolean;
}

/** Moves a file along the status machine, merging metadata into what is stored. */
export async function transitionFile(
  files: DocumentFileRepository,
  fileId: string,
  to: FileProcessingStatus,
  change: FileStatusChange = {},
): Promise<DocumentFile> {
  const file = await files.findById(fileId);
  if (!file) throw new NotFoundError(`File ${fileId} not found`);

  assertTransition(file.processingStatus, to, { administrative: change.administrative });

  const { metadata, administrative: _administrative, ...rest } = change;
  const updated = await files.update(fileId, {
    ...rest,
    processingStatus: to,
    metadata: metadata ? mergeMetadata(file.metadata, metadata) : file.metadata,
  });
  if (!updated) throw new NotFoundError(`File ${fileId} not found`);
  return updated;
}

/** Merges metadata into a file row. Null when the row is gone. */
export async function stampFile(
  files: DocumentFileRepository,
  fileId: string,
  metadata: MetadataMap,
): Promise<DocumentFile | null> {
  const file = await files.findById(fileId);
  if (!file) return null;
  return files.update(fileId, { metadata: mergeMetadata(file.metadata, metadata) });
}

/** Merges metadata into a document row, optionally with other fields. Null when the row is gone. */
export async function stampDocument(
  documents: DocumentRepository,
  documentId: string,
  metadata: MetadataMap,
  patch: Omit<DocumentPatch, "metadata"> = {},
): Promise<Document | null> {
  const document = await documents.findById(documentId);
  if (!document) return null;
  return documents.update(documentId, {
    ...patch,
    metadata: mergeMetadata(document.metadata, metadata),
  });
}
