import type { PipelineError, PipelineResult } from "@mailsync/types";

/** True for success and partial success: at least the batch was accepted. */
export function isSuccessful(result: PipelineResult): boolean {
  return result.status !== "failure";
}

export function processedCountOf(result: PipelineResult): number {
  return result.status === "failure" ? 0 : result.processedCount;
}

export function skippedCountOf(result: PipelineResult): number {
  return result.status === "failure" ? 0 : result.skippedCount;
}

export function errorsOf(result: PipelineResult): readonly PipelineError[] {
  return result.status === "success" ? [] : result.errors;
}

export function errorCountOf(result: PipelineResult): number {
  return errorsOf(result).length;
}
