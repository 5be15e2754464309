import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { SyncBatchJobData, SyncBatchJobResult } from "@mailsync/types";

export const QUEUE_NAMES = {
  SYNC_BATCH: "mailsync:sync-batch",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

export type SyncBatchQueue = Queue<SyncBatchJobData, SyncBatchJobResult>;

export function createSyncBatchQueue(config: QueueConfig): SyncBatchQueue {
  return new Queue<SyncBatchJobData, SyncBatchJobResult>(QUEUE_NAMES.SYNC_BATCH, {
    connection: config.connection,
    defaultJobOptions: {
      // Chunk-level failures are reported in the job result, not thrown, so a
      // retry here only covers a crashed or stalled worker.
      attempts: 2,
      backoff: {
        type: "exponential",
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });
}

/**
 * Parse a `redis://` URL into BullMQ connection options.
 */
export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    password: parsed.password || undefined,
  };
}
