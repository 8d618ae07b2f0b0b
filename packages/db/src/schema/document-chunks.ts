import { sql } from "drizzle-orm";
import { pgTable, text, timestamp, jsonb, integer, uniqueIndex } from "drizzle-orm/pg-core";
import type { MetadataMap } from "@docboard/types";
import { documents } from "./documents.js";
import { documentFiles } from "./document-files.js";

export const documentChunks = pgTable(
  "document_chunks",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    // Null for chunks cut from the document summary
    fileId: text("file_id").references(() => documentFiles.id, { onDelete: "cascade" }),
    content: text("content").notNull(),
    chunkIndex: integer("chunk_index").notNull(),
    vectorId: text("vector_id"),
    embeddingModel: text("embedding_model").notNull(),
    embeddingVersion: text("embedding_version").notNull(),
    metadata: jsonb("metadata").notNull().$type<MetadataMap>().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    fileChunkUq: uniqueIndex("document_chunks_document_file_index_uq").on(
      table.documentId,
      table.fileId,
      table.chunkIndex,
    ),
    summaryChunkUq: uniqueIndex("document_chunks_summary_index_uq")
      .on(table.documentId, table.chunkIndex)
      .where(sql`${table.fileId} is null`),
  }),
);
