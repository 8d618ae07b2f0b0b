import { Readable } from "node:stream";
import {
  S3Client,
  PutObjectCommand,
  HeadObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  NotFound,
  NoSuchKey,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { StorageError } from "@docboard/errors";
import type { ObjectBody, ObjectStat, StorageBackend } from "./backend.js";

/** DeleteObjects accepts at most this many keys per request. */
const DELETE_BATCH_SIZE = 1000;

const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export interface S3BackendOptions {
  /** host:port of the S3-compatible endpoint, e.g. "minio:9000". */
  endpoint: string;
  secure: boolean;
  region: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  /** Pre-built client, mainly for tests. */
  client?: S3Client;
}

function isNotFound(err: unknown): boolean {
  if (err instanceof NotFound || err instanceof NoSuchKey) return true;
  return err instanceof S3ServiceException && err.$metadata.httpStatusCode === 404;
}

function hasHeaders(request: unknown): request is { headers: Record<string, string> } {
  return (
    typeof request === "object" &&
    request !== null &&
    "headers" in request &&
    typeof request.headers === "object" &&
    request.headers !== null
  );
}

/**
 * S3-compatible backend targeting MinIO: path-style addressing, static credentials.
 */
export class S3Backend implements StorageBackend {
  readonly bucket: string;
  private readonly client: S3Client;

  constructor(options: S3BackendOptions) {
    this.bucket = options.bucket;
    this.client =
      options.client ??
      new S3Client({
        region: options.region,
        endpoint: `${options.secure ? "https" : "http"}://${options.endpoint}`,
        forcePathStyle: true,
        credentials: {
          accessKeyId: options.accessKey,
          secretAccessKey: options.secretKey,
        },
      });
  }

  async putObject(
    key: string,
    body: Buffer | Readable,
    size: number,
    contentType: string,
  ): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentLength: size,
        ContentType: contentType,
      }),
    );
  }

  async statObject(key: string): Promise<ObjectStat | null> {
    try {
      const head = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return {
        size: head.ContentLength ?? 0,
        contentType: head.ContentType ?? DEFAULT_CONTENT_TYPE,
        lastModified: head.LastModified,
        etag: head.ETag,
      };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async getObject(key: string): Promise<ObjectBody | null> {
    const command = new GetObjectCommand({ Bucket: this.bucket, Key: key });
    // Transport compression would make the received byte count differ from ContentLength.
    command.middlewareStack.add(
      (next) => async (args) => {
        if (hasHeaders(args.request)) {
          args.request.headers["accept-encoding"] = "identity";
        }
        return next(args);
      },
      { step: "build", name: "acceptIdentityEncoding" },
    );

    try {
      const response = await this.client.send(command);
      const body = response.Body;
      if (!(body instanceof Readable)) {
        throw new StorageError(`GET ${key} returned no readable body`, key);
      }
      return {
        body,
        size: response.ContentLength ?? 0,
        contentType: response.ContentType ?? DEFAULT_CONTENT_TYPE,
        lastModified: response.LastModified,
        etag: response.ETag,
      };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async deleteObject(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  async deleteObjects(keys: string[]): Promise<string[]> {
    const failed: string[] = [];

    for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
      const batch = keys.slice(i, i + DELETE_BATCH_SIZE);
      const response = await this.client.send(
        new DeleteObjectsCommand({
          Bucket: this.bucket,
          Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
        }),
      );
      for (const error of response.Errors ?? []) {
        if (error.Key) failed.push(error.Key);
      }
    }

    return failed;
  }

  async presignGetUrl(key: string, ttlSeconds: number): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn: ttlSeconds,
    });
  }
}
