import { randomUUID } from "node:crypto";
import type {
  PipelineContinuation,
  PipelineLogger,
  PipelineResult,
  PipelineState,
  RecordStore,
  SyncFlags,
} from "@mailsync/types";
import { DEFAULT_CHUNK_SIZE, FixedSizeChunker } from "@mailsync/chunker";
import { StorageError, describePipelineError } from "@mailsync/errors";
import { isRawRecord } from "./loose-value.js";
import { validateBatch } from "./record-validator.js";
import { processChunk, type ChunkRetryOptions } from "./chunk-processor.js";
import { foldOutcomes } from "./outcome-aggregator.js";
import { SerialWorker } from "./serial-worker.js";

export type Scheduler = (callback: () => void) => void;

export interface BatchPipelineOptions {
  store: RecordStore;
  logger: PipelineLogger;
  /** Records per chunk. Default: 100 */
  chunkSize?: number;
  retry?: ChunkRetryOptions;
  /** Where continuations run. Default: the next turn of the event loop. */
  deliver?: Scheduler;
}

const nextTick: Scheduler = (callback) => {
  setImmediate(callback);
};

/**
 * Batch ingestion pipeline: Validate -> Chunk -> Persist (serially) -> Aggregate
 *
 * A batch that fails validation is rejected whole and never reaches the
 * store. Accepted batches are split into chunks which all go through one
 * SerialWorker, so the store sees at most one write at a time even when
 * several batches are in progress. Each batch's continuation runs exactly once.
 */
export class BatchPipeline {
  private readonly worker = new SerialWorker();
  private readonly chunker: FixedSizeChunker;
  private readonly deliver: Scheduler;

  constructor(private readonly options: BatchPipelineOptions) {
    this.chunker = new FixedSizeChunker(options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.deliver = options.deliver ?? nextTick;
  }

  processBatch(
    batch: readonly unknown[],
    flags: SyncFlags,
    continuation: PipelineContinuation,
  ): void {
    const batchId = randomUUID();
    const { logger } = this.options;
    const enter = (state: PipelineState): void => {
      logger.log("debug", `Batch ${batchId} -> ${state}`, { batchId, state });
    };

    logger.log("info", `Starting processing for ${String(batch.length)} records`, {
      batchId,
      recordCount: batch.length,
      ...flags,
    });

    enter("validating");
    const validation = validateBatch(batch);
    if (!validation.isValid) {
      enter("rejected");
      logger.log(
        "error",
        `Validation failed: ${validation.errors.map(describePipelineError).join("; ")}`,
        { batchId, errorCount: validation.errors.length },
      );
      this.complete({ status: "failure", errors: validation.errors }, continuation);
      return;
    }

    enter("chunking");
    const chunks = this.chunker.chunk(batch.filter(isRawRecord));

    enter("processing");
    logger.log("info", `Processing ${String(chunks.length)} chunks`, {
      batchId,
      chunkCount: chunks.length,
    });
    const outcomes = chunks.map((chunk) =>
      this.worker.submit(() =>
        processChunk(chunk, flags, { store: this.options.store, logger, retry: this.options.retry }),
      ),
    );

    void Promise.all(outcomes)
      .then((settled): PipelineResult => {
        enter("aggregating");
        const result = foldOutcomes(settled);
        this.report(batchId, result);
        enter("done");
        return result;
      })
      // processChunk only rejects when a collaborator such as the logger throws;
      // the continuation still gets a result.
      .catch((error: unknown): PipelineResult => ({
        status: "failure",
        errors: [{ type: "storage_save_failed", cause: StorageError.from(error) }],
      }))
      .then((result) => {
        this.complete(result, continuation);
      });
  }

  /** Promise form of {@link processBatch}. */
  run(batch: readonly unknown[], flags: SyncFlags): Promise<PipelineResult> {
    return new Promise((resolve) => {
      this.processBatch(batch, flags, resolve);
    });
  }

  /** Resolves once every submitted chunk has been processed. */
  onIdle(): Promise<void> {
    return this.worker.onIdle();
  }

  private complete(result: PipelineResult, continuation: PipelineContinuation): void {
    this.deliver(() => {
      continuation(result);
    });
  }

  private report(batchId: string, result: PipelineResult): void {
    const { logger } = this.options;
    switch (result.status) {
      case "success":
        logger.log(
          "info",
          `Processing completed: ${String(result.processedCount)} processed, ${String(result.skippedCount)} skipped`,
          { batchId, ...result },
        );
        break;
      case "partial_success":
        logger.log(
          "warning",
          `Processing completed with errors: ${String(result.processedCount)} processed, ${String(result.skippedCount)} skipped, ${String(result.errors.length)} errors`,
          { batchId, processedCount: result.processedCount, skippedCount: result.skippedCount },
        );
        break;
      case "failure":
        logger.log("error", `Processing failed: ${String(result.errors.length)} errors`, {
          batchId,
        });
        break;
    }
  }
}
