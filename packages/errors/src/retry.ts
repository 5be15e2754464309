import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before sleeping ahead of each retry. `attempt` is 1-based. */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Determines whether an error is retryable.
 * Client errors (4xx) are NOT retried; server errors (5xx) and plain errors are.
 */
function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    // Never retry client errors (4xx), e.g. duplicate_key
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    // If retryableErrors list is specified, only retry matching codes
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    // Server errors (5xx) are retryable
    return error.statusCode >= 500;
  }

  // Driver and network errors are retryable unless a filter is specified
  if (retryableErrors && retryableErrors.length > 0) {
    const code = errorCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  // Jitter: between 50% and 100% of the capped delay
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * The last error is rethrown once attempts run out or a non-retryable error
 * is seen.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxRetries = options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
  const baseDelayMs = options?.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = options?.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const retryableErrors = options?.retryableErrors;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      // Stop once attempts are exhausted or the error is not worth retrying
      if (attempt >= maxRetries || !isRetryable(error, retryableErrors)) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      options?.onRetry?.(attempt + 1, delay, error);
      await sleep(delay);
    }
  }

  throw lastError;
}
