export { QUEUE_NAMES, createSyncBatchQueue, parseRedisConnection } from "./queues.js";
export type { QueueConfig, SyncBatchQueue } from "./queues.js";
