export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export { InvalidArgumentError, StorageError } from "./errors.js";

export { describePipelineError } from "./describe.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
