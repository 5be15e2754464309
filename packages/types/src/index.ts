export type { RawRecord, LooseValue, SyncFlags, RecordStore } from "./record.js";
export { ORIGIN_ADDRESS_FIELDS, SYNC_DATE_FORMAT } from "./record.js";

export type { RecordValidationError, ValidationResult } from "./validation.js";

export type {
  Chunk,
  ChunkOutcome,
  ProcessingError,
  StorageFailure,
  StorageFailureReason,
} from "./chunk.js";

export type {
  PipelineError,
  PipelineResult,
  PipelineStatus,
  PipelineState,
  PipelineLogLevel,
  PipelineLogger,
  PipelineContinuation,
} from "./pipeline.js";

export type { AppConfig, DatabaseConfig, RedisConfig, PipelineConfig } from "./config.js";

export type { SyncBatchJobData, SyncBatchJobResult } from "./job.js";
