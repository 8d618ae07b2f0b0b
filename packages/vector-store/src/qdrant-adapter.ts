import { QdrantClient } from "@qdrant/js-client-rest";
import type { Logger } from "@docboard/logger";
import type { IVectorStore } from "./vector-store.interface.js";

const BATCH_SIZE = 100;

export type QdrantPointsClient = Pick<QdrantClient, "delete">;

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  collection: string;
  logger?: Pick<Logger, "debug">;
  client?: QdrantPointsClient;
}

export class QdrantVectorStore implements IVectorStore {
  readonly name = "qdrant";
  private client: QdrantPointsClient;
  private collection: string;
  private logger?: Pick<Logger, "debug">;

  constructor(options: QdrantVectorStoreOptions) {
    this.client = options.client ?? new QdrantClient({ url: options.url, apiKey: options.apiKey });
    this.collection = options.collection;
    this.logger = options.logger;
  }

  async deleteVectors(vectorIds: readonly string[]): Promise<void> {
    for (let i = 0; i < vectorIds.length; i += BATCH_SIZE) {
      const batch = vectorIds.slice(i, i + BATCH_SIZE);
      await this.client.delete(this.collection, { points: [...batch], wait: true });
    }
    if (vectorIds.length > 0) {
      this.logger?.debug({ collection: this.collection, count: vectorIds.length }, "Vectors deleted");
    }
  }
}
