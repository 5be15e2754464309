import { describe, it, expect } from "vitest";
import { AppError } from "./app-error.js";
import { InvalidArgumentError, StorageError } from "./errors.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("root");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
    expect(err.cause).toBeUndefined();
  });

  it("isAppError detects AppError instances", () => {
    expect(AppError.isAppError(new AppError({ message: "x", statusCode: 500, code: "E" }))).toBe(
      true,
    );
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });
});

describe("InvalidArgumentError", () => {
  it("has status 400, INVALID_ARGUMENT code, and argument name", () => {
    const err = new InvalidArgumentError("size must be positive", "size");
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("INVALID_ARGUMENT");
    expect(err.argument).toBe("size");
    expect(err.name).toBe("InvalidArgumentError");
    expect(err).toBeInstanceOf(AppError);
  });
});

describe("StorageError", () => {
  it("defaults to a retryable save failure", () => {
    const err = new StorageError();
    expect(err.message).toBe("Storage save failed");
    expect(err.reason).toBe("save_failed");
    expect(err.statusCode).toBe(503);
    expect(err.code).toBe("STORAGE_SAVE_FAILED");
    expect(err.name).toBe("StorageError");
  });

  it("marks duplicate keys as a 409 with the offending key", () => {
    const err = new StorageError("duplicate", "duplicate_key", { key: "msg-1" });
    expect(err.statusCode).toBe(409);
    expect(err.code).toBe("DUPLICATE_KEY");
    expect(err.key).toBe("msg-1");
  });

  it("from() passes StorageErrors through", () => {
    const err = new StorageError("disk full");
    expect(StorageError.from(err)).toBe(err);
  });

  it("from() wraps plain errors as save failures", () => {
    const cause = new Error("connection reset");
    const err = StorageError.from(cause);
    expect(err.message).toBe("connection reset");
    expect(err.reason).toBe("save_failed");
    expect(err.cause).toBe(cause);
  });

  it("from() stringifies non-error rejections", () => {
    expect(StorageError.from("boom").message).toBe("boom");
  });
});
