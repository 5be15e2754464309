import type { PipelineLogger, PipelineLogLevel } from "@mailsync/types";
import type { Logger } from "./logger.js";

const PINO_LEVELS = {
  debug: "debug",
  info: "info",
  warning: "warn",
  error: "error",
} as const satisfies Record<PipelineLogLevel, string>;

/**
 * Adapt a Pino logger to the pipeline's logging collaborator interface.
 */
export function createPipelineLogger(logger: Logger): PipelineLogger {
  return {
    log(level, message, context) {
      logger[PINO_LEVELS[level]](context ?? {}, message);
    },
  };
}
