import { and, asc, count, eq, gt, lt, or, sql } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import type {
  Document,
  DocumentChunk,
  DocumentFile,
  DocumentFilePatch,
  DocumentPatch,
  NewDocument,
  NewDocumentChunk,
  NewDocumentFile,
} from "@docboard/types";
import type { DbClient } from "./client.js";
import * as schema from "./schema/index.js";
import { documents, documentFiles, documentChunks } from "./schema/index.js";
import type {
  DocumentChunkRepository,
  DocumentFileRepository,
  DocumentRepository,
  Repositories,
  UnitOfWork,
} from "./repositories.js";

/** A client or an open transaction; both expose the same query builders. */
type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

function firstOrThrow<T>(rows: T[], table: string): T {
  const [row] = rows;
  if (row === undefined) throw new Error(`Insert into ${table} returned no row`);
  return row;
}

class DrizzleDocumentRepository implements DocumentRepository {
  constructor(private readonly db: Executor) {}

  async findById(id: string): Promise<Document | null> {
    const [row] = await this.db.select().from(documents).where(eq(documents.id, id)).limit(1);
    return row ?? null;
  }

  async insert(document: NewDocument): Promise<Document> {
    const rows = await this.db.insert(documents).values(document).returning();
    return firstOrThrow(rows, "documents");
  }

  async update(id: string, patch: DocumentPatch): Promise<Document | null> {
    const [row] = await this.db
      .update(documents)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(documents.id, id))
      .returning();
    return row ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.db.delete(documents).where(eq(documents.id, id)).returning({ id: documents.id });
    return rows.length > 0;
  }

  async findVectorizedOutsideWindow(now: Date): Promise<Document[]> {
    return this.db
      .select()
      .from(documents)
      .where(and(eq(documents.vectorized, true), or(lt(documents.endDate, now), gt(documents.startDate, now))));
  }
}

class DrizzleDocumentFileRepository implements DocumentFileRepository {
  constructor(private readonly db: Executor) {}

  async findById(id: string): Promise<DocumentFile | null> {
    const [row] = await this.db.select().from(documentFiles).where(eq(documentFiles.id, id)).limit(1);
    return row ?? null;
  }

  async listByDocument(documentId: string): Promise<DocumentFile[]> {
    return this.db
      .select()
      .from(documentFiles)
      .where(eq(documentFiles.documentId, documentId))
      .orderBy(asc(documentFiles.createdAt), asc(documentFiles.id));
  }

  async countByDocument(documentId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(documentFiles)
      .where(eq(documentFiles.documentId, documentId));
    return row?.value ?? 0;
  }

  async insert(file: NewDocumentFile): Promise<DocumentFile> {
    const rows = await this.db.insert(documentFiles).values(file).returning();
    return firstOrThrow(rows, "document_files");
  }

  async update(id: string, patch: DocumentFilePatch): Promise<DocumentFile | null> {
    const [row] = await this.db
      .update(documentFiles)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(documentFiles.id, id))
      .returning();
    return row ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.db
      .delete(documentFiles)
      .where(eq(documentFiles.id, id))
      .returning({ id: documentFiles.id });
    return rows.length > 0;
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const rows = await this.db
      .delete(documentFiles)
      .where(eq(documentFiles.documentId, documentId))
      .returning({ id: documentFiles.id });
    return rows.length;
  }
}

class DrizzleDocumentChunkRepository implements DocumentChunkRepository {
  constructor(private readonly db: Executor) {}

  async listByDocument(documentId: string): Promise<DocumentChunk[]> {
    return this.db
      .select()
      .from(documentChunks)
      .where(eq(documentChunks.documentId, documentId))
      .orderBy(
        sql`${documentChunks.fileId} is not null`,
        asc(documentChunks.fileId),
        asc(documentChunks.chunkIndex),
      );
  }

  async countByDocument(documentId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(documentChunks)
      .where(eq(documentChunks.documentId, documentId));
    return row?.value ?? 0;
  }

  async insertMany(chunks: readonly NewDocumentChunk[]): Promise<DocumentChunk[]> {
    if (chunks.length === 0) return [];
    return this.db.insert(documentChunks).values([...chunks]).returning();
  }

  async deleteByDocument(documentId: string): Promise<DocumentChunk[]> {
    return this.db.delete(documentChunks).where(eq(documentChunks.documentId, documentId)).returning();
  }

  async deleteByFile(fileId: string): Promise<DocumentChunk[]> {
    return this.db.delete(documentChunks).where(eq(documentChunks.fileId, fileId)).returning();
  }
}

export function createDrizzleRepositories(db: Executor): Repositories {
  return {
    documents: new DrizzleDocumentRepository(db),
    files: new DrizzleDocumentFileRepository(db),
    chunks: new DrizzleDocumentChunkRepository(db),
  };
}

export class DrizzleUnitOfWork implements UnitOfWork {
  readonly repos: Repositories;

  constructor(private readonly db: DbClient) {
    this.repos = createDrizzleRepositories(db);
  }

  async transaction<T>(fn: (scope: Repositories) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(createDrizzleRepositories(tx)));
  }
}
