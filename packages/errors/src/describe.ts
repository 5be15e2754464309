import type { PipelineError, StorageFailure } from "@mailsync/types";

function describeCause(cause: StorageFailure): string {
  return cause.message;
}

/**
 * Human-readable, single-line rendering of a pipeline error, used in log
 * lines and job results.
 */
export function describePipelineError(error: PipelineError): string {
  switch (error.type) {
    case "invalid_format":
      return `Invalid record format at index ${String(error.index)}`;
    case "missing_field":
      return `Missing required field '${error.field}' at index ${String(error.index)}`;
    case "invalid_date":
      return `Invalid date format '${error.value}' at index ${String(error.index)}`;
    case "invalid_email":
      return `Invalid email address '${error.value}' at index ${String(error.index)}`;
    case "chunk_processing_failed":
      return `Chunk ${String(error.chunkIndex)} processing failed: ${describeCause(error.cause)}`;
    case "storage_save_failed":
      return `Storage save failed: ${describeCause(error.cause)}`;
    case "duplicate_key":
      return `Duplicate key: ${error.key}`;
  }
}
