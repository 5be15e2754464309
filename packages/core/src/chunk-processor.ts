import type {
  Chunk,
  ChunkOutcome,
  PipelineLogger,
  RawRecord,
  RecordStore,
  SyncFlags,
} from "@mailsync/types";
import { StorageError, withRetry, type RetryOptions } from "@mailsync/errors";

export type ChunkRetryOptions = Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;

export interface ChunkProcessorDependencies {
  store: RecordStore;
  logger: PipelineLogger;
  /** Whole-chunk retries. Omitted means a single attempt. */
  retry?: ChunkRetryOptions;
}

/**
 * Persist one chunk and translate the store's verdict into a ChunkOutcome.
 * A chunk succeeds or fails as a unit, and this function never rejects.
 */
export async function processChunk(
  chunk: Chunk<RawRecord>,
  flags: SyncFlags,
  deps: ChunkProcessorDependencies,
): Promise<ChunkOutcome> {
  const size = chunk.records.length;
  const { store, logger } = deps;

  try {
    await withRetry(() => store.persist(chunk.records, flags), {
      maxRetries: deps.retry?.maxRetries ?? 0,
      baseDelayMs: deps.retry?.baseDelayMs,
      maxDelayMs: deps.retry?.maxDelayMs,
      onRetry: (attempt, delayMs, error) => {
        logger.log("warning", `Retrying chunk ${String(chunk.index)} in ${String(delayMs)}ms`, {
          chunkIndex: chunk.index,
          attempt,
          error: StorageError.from(error).message,
        });
      },
    });
  } catch (error: unknown) {
    const cause = StorageError.from(error);
    logger.log("error", `Chunk ${String(chunk.index)} failed: ${cause.message}`, {
      chunkIndex: chunk.index,
      size,
      code: cause.code,
    });
    return {
      chunkIndex: chunk.index,
      processedCount: 0,
      skippedCount: size,
      errors: [{ type: "chunk_processing_failed", chunkIndex: chunk.index, cause }],
    };
  }

  logger.log("debug", `Processed chunk ${String(chunk.index)}`, { chunkIndex: chunk.index, size });
  return { chunkIndex: chunk.index, processedCount: size, skippedCount: 0, errors: [] };
}
