export * from "./schema/index.js";
export {
  createDbClient,
  createWorkerDbClient,
  closeDbClient,
  type DbClient,
  type DbClientOptions,
} from "./client.js";
export type {
  DocumentRepository,
  DocumentFileRepository,
  DocumentChunkRepository,
  Repositories,
  UnitOfWork,
} from "./repositories.js";
export { DrizzleUnitOfWork, createDrizzleRepositories } from "./drizzle-unit-of-work.js";
export { MemoryUnitOfWork } from "./memory-unit-of-work.js";
