import type { MetadataMap } from "./json.js";

/** Review state of a document. The only two values the system writes or reads. */
export type DocumentStatus = "pending-approval" | "approved";

export const DOCUMENT_STATUSES = ["pending-approval", "approved"] as const satisfies readonly DocumentStatus[];

export interface Document {
  id: string;
  title: string;
  summary: string | null;
  tags: string[];
  status: DocumentStatus;
  ownerId: string;
  isPublic: boolean;
  startDate: Date | null;
  endDate: Date | null;
  viewCount: number;
  downloadCount: number;
  vectorized: boolean;
  metadata: MetadataMap;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewDocument {
  id?: string;
  title: string;
  summary?: string | null;
  tags?: string[];
  status?: DocumentStatus;
  ownerId: string;
  isPublic?: boolean;
  startDate?: Date | null;
  endDate?: Date | null;
  metadata?: MetadataMap;
}

export type DocumentPatch = Partial<
  Pick<
    Document,
    | "title"
    | "summary"
    | "tags"
    | "status"
    | "isPublic"
    | "startDate"
    | "endDate"
    | "viewCount"
    | "downloadCount"
    | "vectorized"
    | "metadata"
  >
>;

/** Outcome of a batch operation over several documents. */
export interface BatchResult {
  succeeded: string[];
  failed: { id: string; reason: string }[];
}
