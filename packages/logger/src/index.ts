/**
 * @mailsync/logger
 *
 * Structured logging with PII redaction for the sync pipeline.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { createPipelineLogger } from "./pipeline-logger.js";
export { redactValue, redactFields, REDACT_PATHS } from "./pii-redactor.js";
