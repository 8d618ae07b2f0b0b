import { Readable } from "node:stream";
import type { ObjectBody, ObjectStat, StorageBackend } from "./backend.js";

interface StoredObject {
  data: Buffer;
  contentType: string;
  lastModified: Date;
}

export interface MemoryBackendOptions {
  bucket?: string;
  /** Origin used for presigned URLs. Defaults to the internal MinIO alias. */
  baseUrl?: string;
}

/**
 * In-memory backend for tests and local runs. Objects live in a Map.
 */
export class MemoryBackend implements StorageBackend {
  readonly bucket: string;
  private readonly baseUrl: string;
  private readonly objects = new Map<string, StoredObject>();

  constructor(options: MemoryBackendOptions = {}) {
    this.bucket = options.bucket ?? "documents";
    this.baseUrl = options.baseUrl ?? "http://minio:9000";
  }

  async putObject(
    key: string,
    body: Buffer | Readable,
    _size: number,
    contentType: string,
  ): Promise<void> {
    const data = Buffer.isBuffer(body) ? Buffer.from(body) : await collect(body);
    this.objects.set(key, { data, contentType, lastModified: new Date() });
  }

  async statObject(key: string): Promise<ObjectStat | null> {
    const stored = this.objects.get(key);
    if (!stored) return null;
    return {
      size: stored.data.length,
      contentType: stored.contentType,
      lastModified: stored.lastModified,
    };
  }

  async getObject(key: string): Promise<ObjectBody | null> {
    const stored = this.objects.get(key);
    if (!stored) return null;
    return {
      body: Readable.from([Buffer.from(stored.data)]),
      size: stored.data.length,
      contentType: stored.contentType,
      lastModified: stored.lastModified,
    };
  }

  async deleteObject(key: string): Promise<void> {
    this.objects.delete(key);
  }

  async deleteObjects(keys: string[]): Promise<string[]> {
    for (const key of keys) this.objects.delete(key);
    return [];
  }

  async presignGetUrl(key: string, ttlSeconds: number): Promise<string> {
    const path = `/${this.bucket}/${encodeURIComponent(key)}`;
    return `${this.baseUrl}${path}?X-Amz-Expires=${String(ttlSeconds)}&X-Amz-Signature=memory`;
  }

  /** Keys currently stored, in insertion order. */
  keys(): string[] {
    return [...this.objects.keys()];
  }

  /** Raw bytes of a stored object, or undefined. */
  read(key: string): Buffer | undefined {
    return this.objects.get(key)?.data;
  }
}

async function collect(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}
