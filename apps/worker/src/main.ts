import { parseEnv } from "@docboard/config";
import { ChunkLifecycleManager, StagingArea, createTaskHandlers } from "@docboard/core";
import { DrizzleUnitOfWork, closeDbClient, createWorkerDbClient } from "@docboard/db";
import { createLogger } from "@docboard/logger";
import { BullmqTaskQueue, QUEUE_NAMES, createQueues, parseRedisConnection } from "@docboard/queue";
import { ObjectStore, S3Backend } from "@docboard/storage";
import { createVectorStore } from "@docboard/vector-store";
import { createWorkers } from "./workers.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "worker" });

  const db = createWorkerDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  const uow = new DrizzleUnitOfWork(db);

  const { storage } = config;
  const store = new ObjectStore({
    backend: new S3Backend({
      endpoint: storage.endpoint,
      secure: storage.secure,
      region: storage.region,
      accessKey: storage.accessKey,
      secretKey: storage.secretKey,
      bucket: storage.bucket,
    }),
    logger,
    externalUrl: {
      internalEndpoint: storage.endpoint,
      externalEndpoint: storage.externalEndpoint,
      secure: storage.secure,
    },
  });
  const staging = new StagingArea(storage.stagingDir);

  const lifecycle = new ChunkLifecycleManager({
    uow,
    vectorStore: createVectorStore(config.qdrant, logger),
    logger,
    summaryChunkSize: config.chunking.summaryChunkSize,
  });

  const connection = parseRedisConnection(config.redis.url);
  const queue = new BullmqTaskQueue({ queues: createQueues({ connection }), logger });
  const handlers = createTaskHandlers({
    uow,
    store,
    staging,
    lifecycle,
    chunking: { chunkSize: config.chunking.chunkSize, overlap: config.chunking.overlap },
    logger,
  });

  const workers = createWorkers({
    connection,
    handlers,
    revocations: queue,
    logger,
    concurrency: config.worker.concurrency,
  });
  await queue.schedule({ kind: "reconcile-expired", data: { requestedBy: "system" } }, config.worker.reconcileIntervalMs);

  logger.info({ queues: Object.values(QUEUE_NAMES), concurrency: config.worker.concurrency }, "Worker started");

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await queue.close();
    lifecycle.shutdown();
    await closeDbClient(db);
    logger.info("All workers closed");
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      },
    );
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  createLogger({ service: "worker" }).fatal({ err }, "Worker failed to start");
  process.exit(1);
});
