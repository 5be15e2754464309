import { z } from "zod";
import type { PipelineResult, SyncBatchJobData, SyncBatchJobResult } from "@mailsync/types";
import type { BatchPipeline } from "@mailsync/core";
import { errorsOf, processedCountOf, skippedCountOf } from "@mailsync/core";
import { InvalidArgumentError, describePipelineError } from "@mailsync/errors";

const syncBatchJobSchema = z.object({
  accountId: z.string().min(1),
  records: z.array(z.unknown()),
  flags: z.object({
    isManualSync: z.boolean(),
    isProviderManualSync: z.boolean(),
  }),
});

/**
 * Validate a job payload before it reaches the pipeline. Records themselves
 * are left untyped; the pipeline validates them.
 */
export function parseSyncBatchJob(data: unknown): SyncBatchJobData {
  const parsed = syncBatchJobSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid sync batch job: ${issues}`, "data", {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

export function toJobResult(result: PipelineResult): SyncBatchJobResult {
  const errors = errorsOf(result);
  return {
    status: result.status,
    processedCount: processedCountOf(result),
    skippedCount: skippedCountOf(result),
    errorCount: errors.length,
    errors: errors.map(describePipelineError),
  };
}

/**
 * Sync batch processor.
 *
 * Runs one decoded batch from the sync source through the pipeline. A batch
 * the pipeline rejects still completes the job; its errors are in the result.
 */
export async function processSyncBatch(
  data: unknown,
  pipeline: BatchPipeline,
): Promise<SyncBatchJobResult> {
  const job = parseSyncBatchJob(data);
  const result = await pipeline.run(job.records, job.flags);
  return toJobResult(result);
}
