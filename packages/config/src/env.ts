import { z } from "zod";
import type { AppConfig } from "@docboard/types";

const intFromString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const boolFromString = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((value) => value === "true" || value === "1");

/**
 * Zod schema for every environment variable the API and worker processes read.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql:// or postgres://",
      }),
    DATABASE_POOL_MAX: intFromString("10"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),

    // ---------- Object store ----------
    MINIO_ENDPOINT: z.string().min(1).default("minio:9000"),
    MINIO_EXTERNAL_ENDPOINT: z.string().min(1).default("localhost:9000"),
    MINIO_ACCESS_KEY: z.string().min(1, "MINIO_ACCESS_KEY is required"),
    MINIO_SECRET_KEY: z.string().min(1, "MINIO_SECRET_KEY is required"),
    MINIO_SECURE: boolFromString("false"),
    MINIO_BUCKET: z.string().min(3).default("documents"),
    MINIO_REGION: z.string().min(1).default("us-east-1"),
    STAGING_DIR: z.string().min(1).default("/app/shared_tmp"),
    PRESIGN_TTL_SECONDS: intFromString("3600"),

    // ---------- Qdrant ----------
    QDRANT_URL: z.string().url().optional(),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("document_chunks"),

    // ---------- Chunking ----------
    CHUNK_SIZE: intFromString("512"),
    CHUNK_OVERLAP: z.string().default("50").transform(Number).pipe(z.number().int().nonnegative()),
    SUMMARY_CHUNK_SIZE: intFromString("1000"),

    // ---------- Worker ----------
    WORKER_CONCURRENCY: intFromString("4"),
    RECONCILE_INTERVAL_MS: intFromString("3600000"),
  })
  .refine((env) => env.CHUNK_SIZE > env.CHUNK_OVERLAP, {
    message: "CHUNK_SIZE must be greater than CHUNK_OVERLAP",
    path: ["CHUNK_OVERLAP"],
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    storage: {
      endpoint: parsed.MINIO_ENDPOINT,
      externalEndpoint: parsed.MINIO_EXTERNAL_ENDPOINT,
      accessKey: parsed.MINIO_ACCESS_KEY,
      secretKey: parsed.MINIO_SECRET_KEY,
      secure: parsed.MINIO_SECURE,
      bucket: parsed.MINIO_BUCKET,
      region: parsed.MINIO_REGION,
      stagingDir: parsed.STAGING_DIR,
      presignTtlSeconds: parsed.PRESIGN_TTL_SECONDS,
    },

    qdrant: parsed.QDRANT_URL
      ? {
          url: parsed.QDRANT_URL,
          apiKey: parsed.QDRANT_API_KEY,
          collection: parsed.QDRANT_COLLECTION,
        }
      : null,

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
      summaryChunkSize: parsed.SUMMARY_CHUNK_SIZE,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
      reconcileIntervalMs: parsed.RECONCILE_INTERVAL_MS,
    },
  };
}
