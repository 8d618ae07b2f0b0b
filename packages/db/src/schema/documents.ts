import { pgTable, text, timestamp, jsonb, integer, boolean, pgEnum, index } from "drizzle-orm/pg-core";
import type { MetadataMap } from "@docboard/types";

export const documentStatusEnum = pgEnum("document_status", ["pending-approval", "approved"]);

export const documents = pgTable(
  "documents",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    title: text("title").notNull(),
    summary: text("summary"),
    tags: jsonb("tags").notNull().$type<string[]>().default([]),
    status: documentStatusEnum("status").notNull().default("pending-approval"),
    ownerId: text("owner_id").notNull(),
    isPublic: boolean("is_public").notNull().default(false),
    startDate: timestamp("start_date", { withTimezone: true }),
    endDate: timestamp("end_date", { withTimezone: true }),
    viewCount: integer("view_count").notNull().default(0),
    downloadCount: integer("download_count").notNull().default(0),
    vectorized: boolean("vectorized").notNull().default(false),
    metadata: jsonb("metadata").notNull().$type<MetadataMap>().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    vectorizedIdx: index("documents_vectorized_idx").on(table.vectorized),
  }),
);
