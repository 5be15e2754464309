/**
 * PII Redaction Logic
 *
 * Synced mail records carry sender addresses and provider credentials; these
 * helpers keep both out of log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "accesstoken",
  "access_token",
  "refreshtoken",
  "refresh_token",
  "providertoken",
]);

/**
 * Regex to detect email addresses inside string values.
 */
const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Determine whether a key name represents a sensitive field.
 */
function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string, every email address inside it is replaced with
 *   "[REDACTED]".
 *
 * @param key   - The property name being logged.
 * @param value - The property value being logged.
 * @returns The (possibly redacted) value.
 */
export function redactValue(key: string, value: unknown): unknown {
  // Full redaction for sensitive keys
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  // Partial redaction: strip emails from string values
  if (typeof value === "string") {
    // replace() resets lastIndex on global regexes, so the shared instance is safe
    return value.replace(EMAIL_PATTERN, REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level field of a log object.
 * Used as Pino's `formatters.log` hook.
 *
 * @param fields - The merged object of one log call.
 * @returns A shallow copy with redacted values.
 */
export function redactFields(fields: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

const PATH_KEYS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "authorization",
  "cookie",
  "accessToken",
  "refreshToken",
  "providerToken",
] as const;

/**
 * JSON-path strings for Pino's `redact` option: every sensitive key at the top
 * level and one level down (e.g. `flags.accessToken`).
 */
export const REDACT_PATHS: string[] = [...PATH_KEYS, ...PATH_KEYS.map((key) => `*.${key}`)];
