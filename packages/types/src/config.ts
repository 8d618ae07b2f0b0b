export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  storage: StorageConfig;
  qdrant: QdrantConfig | null;
  chunking: ChunkingConfig;
  worker: WorkerConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface StorageConfig {
  endpoint: string;
  externalEndpoint: string;
  accessKey: string;
  secretKey: string;
  secure: boolean;
  bucket: string;
  region: string;
  stagingDir: string;
  presignTtlSeconds: number;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
  summaryChunkSize: number;
}

export interface WorkerConfig {
  concurrency: number;
  reconcileIntervalMs: number;
}
