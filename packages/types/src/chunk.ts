export interface Chunk<T> {
  /** Zero-based position of the chunk within its batch. */
  index: number;
  records: readonly T[];
}

export interface ChunkOutcome {
  chunkIndex: number;
  processedCount: number;
  skippedCount: number;
  errors: ProcessingError[];
}

export type StorageFailureReason = "save_failed" | "duplicate_key";

/**
 * Structural shape of a storage-side failure. `StorageError` in
 * `@mailsync/errors` is the concrete implementation.
 */
export interface StorageFailure {
  readonly reason: StorageFailureReason;
  readonly message: string;
  readonly key?: string;
}

export type ProcessingError =
  | { type: "chunk_processing_failed"; chunkIndex: number; cause: StorageFailure }
  | { type: "storage_save_failed"; cause: StorageFailure }
  | { type: "duplicate_key"; key: string };
