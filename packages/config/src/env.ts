import { z } from "zod";
import type { AppConfig } from "@mailsync/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for the worker's environment. Validates, transforms, and
 * provides defaults so that the resulting object is a strongly-typed AppConfig.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // ---------- Database ----------
  DATABASE_URL: z
    .string()
    .min(1, "DATABASE_URL is required")
    .refine((url) => url.startsWith("postgresql://"), {
      message: "DATABASE_URL must start with postgresql://",
    }),
  DATABASE_POOL_MAX: positiveInt("10"),

  // ---------- Redis ----------
  REDIS_URL: z.string().min(1, "REDIS_URL is required"),

  // ---------- Pipeline ----------
  PIPELINE_CHUNK_SIZE: positiveInt("100"),
  PIPELINE_CHUNK_MAX_RETRIES: nonNegativeInt("0"),
  PIPELINE_RETRY_BASE_DELAY_MS: positiveInt("1000"),
});

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    pipeline: {
      chunkSize: parsed.PIPELINE_CHUNK_SIZE,
      chunkMaxRetries: parsed.PIPELINE_CHUNK_MAX_RETRIES,
      retryBaseDelayMs: parsed.PIPELINE_RETRY_BASE_DELAY_MS,
    },
  };
}
