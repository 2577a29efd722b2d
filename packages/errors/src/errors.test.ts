import { describe, it, expect } from "vitest";
import { AppError } from "./app-error.js";
import {
  CancelledError,
  ContentRejectedError,
  ExtractionError,
  InvalidTransitionError,
  ListingError,
  PermanentError,
  RateLimitedError,
  RecordRejectedError,
  TimeoutError,
  TransientError,
  UnsupportedMediaTypeError,
  VectorStoreUnavailableError,
} from "./errors.js";
import { errorClassOf, errorCodeOf, errorMessageOf, httpStatusOf } from "./inspect.js";

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
  });

  it("defaults isOperational to true", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
  });

  it("isAppError detects AppError instances", () => {
    expect(AppError.isAppError(new ListingError())).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });
});

describe("error taxonomy", () => {
  it("extraction failures are permanent", () => {
    const err = new ExtractionError("bad bytes");
    expect(err).toBeInstanceOf(PermanentError);
    expect(err.code).toBe("EXTRACTION_ERROR");
    expect(err.statusCode).toBe(422);
    expect(err.name).toBe("ExtractionError");
  });

  it("unsupported media types are extraction failures", () => {
    const err = new UnsupportedMediaTypeError("image/png");
    expect(err).toBeInstanceOf(ExtractionError);
    expect(err.code).toBe("UNSUPPORTED_MEDIA_TYPE");
    expect(err.mediaType).toBe("image/png");
    expect(err.message).toBe("Unsupported media type: image/png");
  });

  it("rate limits are transient and keep retryAfter", () => {
    const err = new RateLimitedError("slow down", 7);
    expect(err).toBeInstanceOf(TransientError);
    expect(err.statusCode).toBe(429);
    expect(err.retryAfter).toBe(7);
  });

  it("timeouts carry the service name", () => {
    const err = new TimeoutError(undefined, "cohere");
    expect(err.message).toBe("Call timed out");
    expect(err.service).toBe("cohere");
    expect(err.statusCode).toBe(504);
  });

  it("record rejections list every rejected id", () => {
    const err = new RecordRejectedError([
      { id: "a", reason: "bad vector" },
      { id: "b", reason: "bad payload" },
    ]);
    expect(err.message).toBe("Vector store rejected 2 record(s)");
    expect(err.rejected.map((r) => r.id)).toEqual(["a", "b"]);
  });

  it("invalid transitions are programming errors", () => {
    const err = new InvalidTransitionError("discovered", "moved");
    expect(err.isOperational).toBe(false);
    expect(err.message).toBe("Invalid document state transition: discovered -> moved");
  });

  it("listing and cancellation are neither permanent nor transient", () => {
    for (const err of [new ListingError(), new CancelledError()]) {
      expect(err).not.toBeInstanceOf(PermanentError);
      expect(err).not.toBeInstanceOf(TransientError);
    }
    expect(new CancelledError().statusCode).toBe(499);
  });

  it("content rejections are 400s", () => {
    const err = new ContentRejectedError("too long", "cohere");
    expect(err.statusCode).toBe(400);
    expect(err.service).toBe("cohere");
  });
});

describe("inspect helpers", () => {
  it("reads codes off node errors", () => {
    const err = Object.assign(new Error("reset"), { code: "ECONNRESET" });
    expect(errorCodeOf(err)).toBe("ECONNRESET");
    expect(errorCodeOf(new Error("plain"))).toBeUndefined();
    expect(errorCodeOf("nope")).toBeUndefined();
  });

  it("reads http status from status, statusCode or $metadata", () => {
    expect(httpStatusOf({ status: 503 })).toBe(503);
    expect(httpStatusOf({ statusCode: 429 })).toBe(429);
    expect(httpStatusOf({ $metadata: { httpStatusCode: 404 } })).toBe(404);
    expect(httpStatusOf(new Error("x"))).toBeUndefined();
  });

  it("names the error class", () => {
    expect(errorClassOf(new VectorStoreUnavailableError())).toBe("VectorStoreUnavailableError");
    expect(errorClassOf(new TypeError("x"))).toBe("TypeError");
    expect(errorClassOf(42)).toBe("UnknownError");
  });

  it("extracts messages", () => {
    expect(errorMessageOf(new Error("boom"))).toBe("boom");
    expect(errorMessageOf("text")).toBe("text");
    expect(errorMessageOf({})).toBe("Unknown error");
  });
});
