import type { QdrantConfig } from "@docboard/types";
import type { Logger } from "@docboard/logger";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { NoopVectorStore } from "./noop-adapter.js";

export type { IVectorStore } from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export type { QdrantVectorStoreOptions, QdrantPointsClient } from "./qdrant-adapter.js";
export { NoopVectorStore } from "./noop-adapter.js";

/** Qdrant when configured, otherwise a store that does nothing. */
export function createVectorStore(config: QdrantConfig | null, logger?: Logger): IVectorStore {
  if (!config) return new NoopVectorStore();

  if (!config.url) {
    throw new Error("url is required for Qdrant vector store");
  }
  return new QdrantVectorStore({
    url: config.url,
    apiKey: config.apiKey,
    collection: config.collection,
    logger,
  });
}
