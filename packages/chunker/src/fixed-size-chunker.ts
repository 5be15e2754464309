import type { Chunk } from "@mailsync/types";
import { InvalidArgumentError } from "@mailsync/errors";

export const DEFAULT_CHUNK_SIZE = 100;

/**
 * Partition `batch` into contiguous, order-preserving chunks of `size`
 * elements. Every chunk but the last is full; the last holds the remainder.
 * Concatenating the chunks' records reproduces `batch` exactly.
 */
export function split<T>(batch: readonly T[], size: number): Chunk<T>[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidArgumentError(
      `Chunk size must be a positive integer, got ${String(size)}`,
      "size",
      { details: { size } },
    );
  }

  const chunks: Chunk<T>[] = [];
  for (let start = 0; start < batch.length; start += size) {
    chunks.push({
      index: chunks.length,
      records: batch.slice(start, start + size),
    });
  }
  return chunks;
}

/**
 * Fixed-size chunker bound to one size, validated once at construction.
 */
export class FixedSizeChunker {
  readonly strategy = "fixed";

  constructor(readonly size: number = DEFAULT_CHUNK_SIZE) {
    // throws InvalidArgumentError for a bad size
    split([], size);
  }

  chunk<T>(batch: readonly T[]): Chunk<T>[] {
    return split(batch, this.size);
  }
}
