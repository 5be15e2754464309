import type { PipelineStatus } from "./pipeline.js";
import type { SyncFlags } from "./record.js";

export interface SyncBatchJobData {
  accountId: string;
  /** Decoded but unvalidated records, exactly as the sync source sent them. */
  records: unknown[];
  flags: SyncFlags;
}

export interface SyncBatchJobResult {
  status: PipelineStatus;
  processedCount: number;
  skippedCount: number;
  errorCount: number;
  errors: string[];
}
