import { describe, it, expect, vi, beforeEach } from "vitest";
import { withRetry } from "./retry.js";
import { AppError } from "./app-error.js";
import { StorageError } from "./errors.js";

describe("withRetry", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after maxRetries exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3); // 1 initial + 2 retries
  });

  it("does NOT retry 4xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Bad request", statusCode: 400, code: "BAD_REQUEST" }),
      );

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow("Bad request");

    expect(fn).toHaveBeenCalledOnce(); // No retries
  });

  it("retries 5xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(
        new AppError({ message: "Server error", statusCode: 500, code: "INTERNAL" }),
      )
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("retries non-AppError errors (network failures)", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("ECONNREFUSED")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("respects retryableErrors filter", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Server error", statusCode: 502, code: "BAD_GATEWAY" }),
      );

    await expect(
      withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 1,
        retryableErrors: ["TIMEOUT"], // BAD_GATEWAY not in list
      }),
    ).rejects.toThrow("Server error");

    expect(fn).toHaveBeenCalledOnce(); // No retries since code not in retryableErrors
  });

  it("does not retry duplicate-key storage errors", async () => {
    const fn = vi.fn().mockRejectedValue(new StorageError("dup", "duplicate_key", { key: "k" }));

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow("dup");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries storage save failures", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new StorageError("flaky")).mockResolvedValue("ok");

    const result = await withRetry(fn, { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("reports each retry through onRetry", async () => {
    const failure = new Error("transient");
    const fn = vi.fn().mockRejectedValueOnce(failure).mockResolvedValue("ok");
    const onRetry = vi.fn();

    await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1, onRetry });

    expect(onRetry).toHaveBeenCalledOnce();
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Number), failure);
  });

  it("makes a single attempt when maxRetries is 0", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("once"));

    await expect(withRetry(fn, { maxRetries: 0 })).rejects.toThrow("once");

    expect(fn).toHaveBeenCalledOnce();
  });
});
