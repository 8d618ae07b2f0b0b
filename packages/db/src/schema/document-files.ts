import { pgTable, text, timestamp, jsonb, integer, pgEnum, index } from "drizzle-orm/pg-core";
import type { MetadataMap } from "@docboard/types";
import { documents } from "./documents.js";

export const fileTypeEnum = pgEnum("file_type", ["pdf", "docx", "txt", "xlsx", "pptx"]);

export const fileProcessingStatusEnum = pgEnum("file_processing_status", [
  "pending",
  "processing",
  "completed",
  "failed",
]);

export const documentFiles = pgTable(
  "document_files",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id").references(() => documents.id, { onDelete: "cascade" }),
    storageKey: text("storage_key").notNull().unique(),
    originalName: text("original_name").notNull(),
    fileType: fileTypeEnum("file_type").notNull(),
    fileSize: integer("file_size").notNull().default(0),
    contentType: text("content_type").notNull(),
    processingStatus: fileProcessingStatusEnum("processing_status").notNull().default("pending"),
    metadata: jsonb("metadata").notNull().$type<MetadataMap>().default({}),
    errorMessage: text("error_message"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentIdx: index("document_files_document_id_idx").on(table.documentId),
  }),
);
