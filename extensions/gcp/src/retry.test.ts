import { describe, it, expect, vi, afterEach } from "vitest";

import { GcpApiError } from "./api.js";
import {
  GCP_RETRY_DEFAULTS,
  formatErrorMessage,
  getGcpRetryAfterMs,
  resolveRetryConfig,
  shouldRetryGcpError,
  withGcpRetry,
} from "./retry.js";

// =============================================================================
// Configuration
// =============================================================================

describe("resolveRetryConfig", () => {
  it("fills in defaults", () => {
    expect(resolveRetryConfig()).toEqual(GCP_RETRY_DEFAULTS);
  });

  it("keeps explicit values", () => {
    expect(resolveRetryConfig({ maxAttempts: 5, minDelayMs: 1 })).toEqual({
      maxAttempts: 5,
      minDelayMs: 1,
      maxDelayMs: 30_000,
      jitterFactor: 0.2,
    });
  });
});

// =============================================================================
// shouldRetryGcpError
// =============================================================================

describe("shouldRetryGcpError", () => {
  it("retries socket errors by code", () => {
    const err = Object.assign(new Error("socket closed"), { code: "ECONNRESET" });
    expect(shouldRetryGcpError(err)).toBe(true);
  });

  it("does not retry unrelated codes", () => {
    expect(shouldRetryGcpError({ code: "ENOENT" })).toBe(false);
  });

  it("retries 429 and 5xx API errors", () => {
    expect(shouldRetryGcpError(new GcpApiError("slow down", 429, "RESOURCE_EXHAUSTED"))).toBe(true);
    expect(shouldRetryGcpError(new GcpApiError("oops", 503, ""))).toBe(true);
    expect(shouldRetryGcpError({ status: 502 })).toBe(true);
  });

  it("does not retry 4xx API errors other than 429", () => {
    expect(shouldRetryGcpError(new GcpApiError("bad", 400, "INVALID_ARGUMENT"))).toBe(false);
    expect(shouldRetryGcpError(new GcpApiError("missing", 404, "NOT_FOUND"))).toBe(false);
  });

  it("retries on message patterns", () => {
    expect(shouldRetryGcpError(new TypeError("fetch failed"))).toBe(true);
    expect(shouldRetryGcpError({ message: "Rate Limit exceeded for project" })).toBe(true);
  });

  it("returns false for null and undefined", () => {
    expect(shouldRetryGcpError(null)).toBe(false);
    expect(shouldRetryGcpError(undefined)).toBe(false);
  });
});

// =============================================================================
// getGcpRetryAfterMs
// =============================================================================

describe("getGcpRetryAfterMs", () => {
  it("reads seconds", () => {
    const err = new GcpApiError("slow", 429, "", { "retry-after": "3" });
    expect(getGcpRetryAfterMs(err)).toBe(3000);
  });

  it("reads an HTTP date relative to now", () => {
    const now = Date.parse("2024-05-01T00:00:00Z");
    const err = new GcpApiError("slow", 429, "", { "retry-after": "Wed, 01 May 2024 00:00:10 GMT" });
    expect(getGcpRetryAfterMs(err, now)).toBe(10_000);
  });

  it("returns null without the header or for other errors", () => {
    expect(getGcpRetryAfterMs(new GcpApiError("x", 500, ""))).toBeNull();
    expect(getGcpRetryAfterMs(new Error("x"))).toBeNull();
  });
});

// =============================================================================
// withGcpRetry
// =============================================================================

describe("withGcpRetry", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the first successful result", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    await expect(withGcpRetry(fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries retryable failures until success", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new GcpApiError("unavailable", 503, "UNAVAILABLE"))
      .mockResolvedValueOnce("done");

    await expect(withGcpRetry(fn, { minDelayMs: 1, maxDelayMs: 1 })).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry non-retryable failures", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new GcpApiError("missing", 404, "NOT_FOUND"));

    await expect(withGcpRetry(fn, { minDelayMs: 1 })).rejects.toThrow("missing");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("gives up after maxAttempts", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new GcpApiError("boom", 500, "INTERNAL"));

    await expect(withGcpRetry(fn, { maxAttempts: 3, minDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow("boom");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("caps a retry-after delay at maxDelayMs", async () => {
    vi.useFakeTimers();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new GcpApiError("slow", 429, "", { "retry-after": "120" }))
      .mockResolvedValueOnce("late");

    const promise = withGcpRetry(fn, { maxDelayMs: 50 });
    await vi.advanceTimersByTimeAsync(50);

    await expect(promise).resolves.toBe("late");
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

// =============================================================================
// formatErrorMessage
// =============================================================================

describe("formatErrorMessage", () => {
  it("includes code, HTTP status and message", () => {
    expect(formatErrorMessage(new GcpApiError("Not found", 404, "NOT_FOUND"))).toBe(
      "[NOT_FOUND] (HTTP 404) Not found",
    );
  });

  it("passes strings through", () => {
    expect(formatErrorMessage("plain")).toBe("plain");
  });

  it("falls back for empty values", () => {
    expect(formatErrorMessage(undefined)).toBe("Unknown error");
    expect(formatErrorMessage({})).toBe("Unknown error");
  });
});
