import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { MemoryUnitOfWork } from "@docboard/db";
import { createSilentLogger, type Logger } from "@docboard/logger";
import type { TaskContext } from "@docboard/queue";
import { MemoryBackend, ObjectStore } from "@docboard/storage";
import type { Document, DocumentFile, NewDocument, NewDocumentFile } from "@docboard/types";
import type { IVectorStore } from "@docboard/vector-store";
import { ChunkLifecycleManager } from "./chunk-lifecycle.js";
import type { Clock } from "./metadata.js";
import { StagingArea } from "./staging.js";

export const FIXED_NOW = new Date("2026-03-01T09:00:00.000Z");

export const fixedClock: Clock = () => new Date(FIXED_NOW);

/** Vector index double that records every deletion and can be told to fail. */
export class RecordingVectorStore implements IVectorStore {
  readonly name = "recording";
  readonly deletedBatches: string[][] = [];
  failure: Error | null = null;

  async deleteVectors(vectorIds: readonly string[]): Promise<void> {
    if (this.failure) throw this.failure;
    this.deletedBatches.push([...vectorIds]);
  }
}

export interface Harness {
  uow: MemoryUnitOfWork;
  backend: MemoryBackend;
  store: ObjectStore;
  staging: StagingArea;
  vectorStore: RecordingVectorStore;
  lifecycle: ChunkLifecycleManager;
  logger: Logger;
  clock: Clock;
  dispose(): Promise<void>;
}

/** In-memory persistence, storage and vector index around a fresh staging directory. */
export async function createHarness(): Promise<Harness> {
  const logger = createSilentLogger();
  const uow = new MemoryUnitOfWork();
  const backend = new MemoryBackend();
  const store = new ObjectStore({ backend, logger, statRetry: { maxAttempts: 3, delayMs: 0 } });
  const stagingDir = await mkdtemp(path.join(tmpdir(), "docboard-staging-"));
  const vectorStore = new RecordingVectorStore();
  const lifecycle = new ChunkLifecycleManager({ uow, vectorStore, logger, clock: fixedClock });

  return {
    uow,
    backend,
    store,
    staging: new StagingArea(stagingDir),
    vectorStore,
    lifecycle,
    logger,
    clock: fixedClock,
    dispose: async () => {
      lifecycle.shutdown();
      await rm(stagingDir, { recursive: true, force: true });
    },
  };
}

export function taskContext(overrides: Partial<TaskContext> = {}): TaskContext {
  return {
    taskId: "task-1",
    attempt: 1,
    isFinalAttempt: false,
    throwIfRevoked: async () => undefined,
    ...overrides,
  };
}

export async function seedDocument(uow: MemoryUnitOfWork, overrides: Partial<NewDocument> = {}): Promise<Document> {
  return uow.repos.documents.insert({ title: "Quarterly report", ownerId: "owner-1", ...overrides });
}

export async function seedFile(
  uow: MemoryUnitOfWork,
  documentId: string | null,
  overrides: Partial<NewDocumentFile> = {},
): Promise<DocumentFile> {
  const name = overrides.originalName ?? "notes.txt";
  return uow.repos.files.insert({
    documentId,
    storageKey: `key-${name}`,
    originalName: name,
    fileType: "txt",
    fileSize: 0,
    contentType: "text/plain",
    processingStatus: "completed",
    ...overrides,
  });
}
