export { BatchPipeline } from "./batch-pipeline.js";
export type { BatchPipelineOptions, Scheduler } from "./batch-pipeline.js";

export { validateBatch, validateRecord, isValidEmail, isValidSyncDate } from "./record-validator.js";
export { isRawRecord, readField } from "./loose-value.js";

export { processChunk } from "./chunk-processor.js";
export type { ChunkProcessorDependencies, ChunkRetryOptions } from "./chunk-processor.js";

export { foldOutcomes } from "./outcome-aggregator.js";
export { SerialWorker } from "./serial-worker.js";

export {
  isSuccessful,
  processedCountOf,
  skippedCountOf,
  errorsOf,
  errorCountOf,
} from "./pipeline-result.js";
