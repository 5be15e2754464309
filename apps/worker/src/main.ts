import { Worker } from "bullmq";
import type { SyncBatchJobData, SyncBatchJobResult } from "@mailsync/types";
import { parseEnv } from "@mailsync/config";
import { createLogger, createChildLogger, createPipelineLogger } from "@mailsync/logger";
import { QUEUE_NAMES, parseRedisConnection } from "@mailsync/queue";
import { createDbClient, createDrizzleMessageWriter, createRecordStore } from "@mailsync/db";
import { BatchPipeline } from "@mailsync/core";
import { processSyncBatch } from "./processors/sync-batch.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "mailsync-worker" });

  const { db, close: closeDb } = createDbClient({
    url: config.database.url,
    maxConnections: config.database.poolMax,
  });

  const pipeline = new BatchPipeline({
    store: createRecordStore(createDrizzleMessageWriter(db)),
    logger: createPipelineLogger(createChildLogger(logger, { component: "pipeline" })),
    chunkSize: config.pipeline.chunkSize,
    retry: {
      maxRetries: config.pipeline.chunkMaxRetries,
      baseDelayMs: config.pipeline.retryBaseDelayMs,
    },
  });

  // The pipeline already serializes writes; one job at a time keeps batches
  // from one account in arrival order.
  const worker = new Worker<SyncBatchJobData, SyncBatchJobResult>(
    QUEUE_NAMES.SYNC_BATCH,
    async (job) => processSyncBatch(job.data, pipeline),
    { connection: parseRedisConnection(config.redis.url), concurrency: 1 },
  );

  worker.on("completed", (job, result) => {
    logger.info({ jobId: job.id, accountId: job.data.accountId, ...result }, "Sync batch completed");
  });
  worker.on("failed", (job, err) => {
    logger.error({ jobId: job?.id, err }, "Sync batch job failed");
  });

  logger.info({ queue: QUEUE_NAMES.SYNC_BATCH }, "Worker started");

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    await worker.close();
    await pipeline.onIdle();
    await closeDb();
    logger.info("Worker closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  createLogger({ service: "mailsync-worker" }).fatal({ err }, "Fatal error");
  process.exit(1);
});
