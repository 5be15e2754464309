import type { ChunkOutcome, PipelineResult, ProcessingError } from "@mailsync/types";

/**
 * Fold chunk outcomes, in submission order, into one pipeline result.
 *
 * - no errors                   -> success
 * - errors, something processed -> partial_success
 * - errors, nothing processed   -> failure
 */
export function foldOutcomes(outcomes: readonly ChunkOutcome[]): PipelineResult {
  let processedCount = 0;
  let skippedCount = 0;
  const errors: ProcessingError[] = [];

  for (const outcome of outcomes) {
    processedCount += outcome.processedCount;
    skippedCount += outcome.skippedCount;
    errors.push(...outcome.errors);
  }

  if (errors.length === 0) {
    return { status: "success", processedCount, skippedCount };
  }
  if (processedCount > 0) {
    return { status: "partial_success", processedCount, skippedCount, errors };
  }
  return { status: "failure", errors };
}
