import type { Readable } from "node:stream";

export interface ObjectStat {
  size: number;
  contentType: string;
  lastModified?: Date;
  etag?: string;
}

export interface ObjectBody extends ObjectStat {
  body: AsyncIterable<Uint8Array>;
}

/**
 * Raw bucket operations. Implementations do not retry and do not wrap errors;
 * {@link ObjectStore} layers the retry policy, error mapping and logging on top.
 */
export interface StorageBackend {
  readonly bucket: string;

  putObject(key: string, body: Buffer | Readable, size: number, contentType: string): Promise<void>;

  /** Returns null when the key does not exist. */
  statObject(key: string): Promise<ObjectStat | null>;

  /** Returns null when the key does not exist. */
  getObject(key: string): Promise<ObjectBody | null>;

  deleteObject(key: string): Promise<void>;

  /**
   * Delete several keys in as few round trips as the backend allows.
   * Resolves with the keys the backend reported as not deleted.
   */
  deleteObjects(keys: string[]): Promise<string[]>;

  presignGetUrl(key: string, ttlSeconds: number): Promise<string>;
}
