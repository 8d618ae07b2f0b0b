import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { NotFoundError, StorageError, withRetry } from "@docboard/errors";
import { createSilentLogger, redactPresignedUrl, type Logger } from "@docboard/logger";
import type { ObjectBody, ObjectStat, StorageBackend } from "./backend.js";
import { DEFAULT_READ_CHUNK_SIZE, readInChunks } from "./chunked-reader.js";
import { toExternalUrl, type ExternalUrlOptions } from "./external-url.js";

export interface StatRetryPolicy {
  /** Default: 3 */
  maxAttempts?: number;
  /** Fixed delay between attempts. Default: 1000 */
  delayMs?: number;
}

export interface ObjectStoreOptions {
  backend: StorageBackend;
  logger?: Logger;
  /** Retry policy for existence checks. */
  statRetry?: StatRetryPolicy;
  /** When set, presigned URLs signed against the internal endpoint are rewritten. */
  externalUrl?: ExternalUrlOptions;
  /** Size of the buffers yielded by {@link ObjectStore.streamGet}. Default: 4 MiB */
  readChunkSize?: number;
}

export interface ObjectStream {
  stream: AsyncIterable<Buffer>;
  size: number;
  contentType: string;
}

export interface DeleteManyResult {
  allOk: boolean;
  failedKeys: string[];
}

/** Missing or zero-byte stat result; retried like any transient failure. */
class ObjectNotReadyError extends Error {
  constructor(readonly key: string, readonly observedSize: number | null) {
    super(
      observedSize === null
        ? `Object ${key} not visible yet`
        : `Object ${key} reported ${String(observedSize)} bytes`,
    );
    this.name = "ObjectNotReadyError";
  }
}

/**
 * Object Store Client. Keys are opaque (a UUID plus the original extension).
 *
 * Existence checks tolerate brief read-after-write inconsistency: a missing
 * object or a zero-byte stat is retried before being reported as absent.
 */
export class ObjectStore {
  private readonly backend: StorageBackend;
  private readonly logger: Logger;
  private readonly statRetry: Required<StatRetryPolicy>;
  private readonly externalUrl?: ExternalUrlOptions;
  private readonly readChunkSize: number;

  constructor(options: ObjectStoreOptions) {
    this.backend = options.backend;
    this.logger = options.logger ?? createSilentLogger();
    this.statRetry = {
      maxAttempts: options.statRetry?.maxAttempts ?? 3,
      delayMs: options.statRetry?.delayMs ?? 1_000,
    };
    this.externalUrl = options.externalUrl;
    this.readChunkSize = options.readChunkSize ?? DEFAULT_READ_CHUNK_SIZE;
  }

  get bucket(): string {
    return this.backend.bucket;
  }

  async put(key: string, body: Buffer | Readable, size: number, contentType: string): Promise<void> {
    try {
      await this.backend.putObject(key, body, size, contentType);
    } catch (err) {
      throw new StorageError(`Failed to store object ${key}`, key, { cause: err });
    }
    this.logger.debug({ key, size, contentType }, "object stored");
  }

  /**
   * Size and content type of `key`, or null once every attempt saw the object
   * missing or empty. Backend failures that outlast the retries raise StorageError.
   */
  async stat(key: string, policy?: StatRetryPolicy): Promise<ObjectStat | null> {
    const maxAttempts = policy?.maxAttempts ?? this.statRetry.maxAttempts;
    const delayMs = policy?.delayMs ?? this.statRetry.delayMs;

    try {
      return await withRetry(
        async () => {
          const stat = await this.backend.statObject(key);
          if (stat === null || stat.size === 0) {
            throw new ObjectNotReadyError(key, stat?.size ?? null);
          }
          return stat;
        },
        {
          maxAttempts,
          delayMs,
          onRetry: (error, attempt) => {
            this.logger.debug({ key, attempt, err: error }, "stat attempt failed, retrying");
          },
        },
      );
    } catch (err) {
      if (err instanceof ObjectNotReadyError) {
        this.logger.info(
          { key, attempts: maxAttempts, observedSize: err.observedSize },
          "object not found after retries",
        );
        return null;
      }
      throw new StorageError(`Failed to stat object ${key}`, key, { cause: err });
    }
  }

  async exists(key: string, policy?: StatRetryPolicy): Promise<boolean> {
    return (await this.stat(key, policy)) !== null;
  }

  /**
   * Open `key` for reading. The returned stream yields buffers of at most
   * `readChunkSize` bytes so large objects are never held in memory whole.
   */
  async streamGet(key: string): Promise<ObjectStream> {
    let object: ObjectBody | null;
    try {
      object = await this.backend.getObject(key);
    } catch (err) {
      throw new StorageError(`Failed to read object ${key}`, key, { cause: err });
    }
    if (object === null) {
      throw new NotFoundError(`Object not found: ${key}`, { details: { key } });
    }

    return {
      stream: readInChunks(object.body, this.readChunkSize),
      size: object.size,
      contentType: object.contentType,
    };
  }

  /** Stream `key` into a local file. Resolves with the number of bytes written. */
  async downloadToFile(key: string, destination: string): Promise<number> {
    const { stream } = await this.streamGet(key);
    let written = 0;
    const counted = Readable.from(
      (async function* () {
        for await (const chunk of stream) {
          written += chunk.length;
          yield chunk;
        }
      })(),
    );
    try {
      await pipeline(counted, createWriteStream(destination));
    } catch (err) {
      throw new StorageError(`Failed to download object ${key}`, key, { cause: err });
    }
    return written;
  }

  async delete(key: string): Promise<void> {
    try {
      await this.backend.deleteObject(key);
    } catch (err) {
      throw new StorageError(`Failed to delete object ${key}`, key, { cause: err });
    }
    this.logger.debug({ key }, "object deleted");
  }

  /** Never throws for partial failure; the keys that were not deleted are reported. */
  async deleteMany(keys: string[]): Promise<DeleteManyResult> {
    if (keys.length === 0) {
      return { allOk: true, failedKeys: [] };
    }

    let failedKeys: string[];
    try {
      failedKeys = await this.backend.deleteObjects(keys);
    } catch (err) {
      this.logger.warn({ err, count: keys.length }, "batch delete failed");
      failedKeys = [...keys];
    }

    if (failedKeys.length > 0) {
      this.logger.warn({ failedKeys }, "some objects could not be deleted");
    }
    return { allOk: failedKeys.length === 0, failedKeys };
  }

  async presignGet(key: string, ttlSeconds: number): Promise<string> {
    let url: string;
    try {
      url = await this.backend.presignGetUrl(key, ttlSeconds);
    } catch (err) {
      throw new StorageError(`Failed to presign object ${key}`, key, { cause: err });
    }

    const external = this.externalUrl ? toExternalUrl(url, this.externalUrl) : url;
    this.logger.debug({ key, ttlSeconds, url: redactPresignedUrl(external) }, "presigned GET url");
    return external;
  }
}
