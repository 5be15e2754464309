import type { ProcessingError } from "./chunk.js";
import type { RecordValidationError } from "./validation.js";

export type PipelineError = RecordValidationError | ProcessingError;

export type PipelineResult =
  | { status: "success"; processedCount: number; skippedCount: number }
  | {
      status: "partial_success";
      processedCount: number;
      skippedCount: number;
      errors: ProcessingError[];
    }
  | { status: "failure"; errors: PipelineError[] };

export type PipelineStatus = PipelineResult["status"];

export type PipelineState =
  | "idle"
  | "validating"
  | "rejected"
  | "chunking"
  | "processing"
  | "aggregating"
  | "done";

export type PipelineLogLevel = "debug" | "info" | "warning" | "error";

/**
 * Logging collaborator. Fire-and-forget: implementations must not throw and
 * nothing they do affects a batch outcome.
 */
export interface PipelineLogger {
  log(level: PipelineLogLevel, message: string, context?: Record<string, unknown>): void;
}

export type PipelineContinuation = (result: PipelineResult) => void;
