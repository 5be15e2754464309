import type { StorageFailure, StorageFailureReason } from "@mailsync/types";
import { AppError } from "./app-error.js";

export class InvalidArgumentError extends AppError {
  public readonly argument: string;

  constructor(message: string, argument: string, options?: { details?: Record<string, unknown> }) {
    super({
      message,
      statusCode: 400,
      code: "INVALID_ARGUMENT",
      details: options?.details,
    });
    this.argument = argument;
  }
}

const STORAGE_STATUS: Record<StorageFailureReason, number> = {
  save_failed: 503,
  duplicate_key: 409,
};

const STORAGE_CODE: Record<StorageFailureReason, string> = {
  save_failed: "STORAGE_SAVE_FAILED",
  duplicate_key: "DUPLICATE_KEY",
};

/**
 * Raised by a record store when a chunk could not be persisted. The whole
 * chunk is considered unwritten.
 */
export class StorageError extends AppError implements StorageFailure {
  public readonly reason: StorageFailureReason;
  public readonly key?: string;

  constructor(
    message = "Storage save failed",
    reason: StorageFailureReason = "save_failed",
    options?: { key?: string; cause?: unknown; details?: Record<string, unknown> },
  ) {
    super({
      message,
      statusCode: STORAGE_STATUS[reason],
      code: STORAGE_CODE[reason],
      cause: options?.cause,
      details: options?.details,
    });
    this.reason = reason;
    this.key = options?.key;
  }

  static isStorageError(err: unknown): err is StorageError {
    return err instanceof StorageError;
  }

  /**
   * Normalise anything a store rejected with. Existing `StorageError`s pass
   * through untouched; everything else becomes a `save_failed` wrapping it.
   */
  static from(err: unknown): StorageError {
    if (StorageError.isStorageError(err)) {
      return err;
    }
    const message = err instanceof Error ? err.message : String(err);
    return new StorageError(message, "save_failed", { cause: err });
  }
}
