/**
 * GCP Extension: Retry Utilities
 *
 * Retry logic for GCP REST calls: exponential backoff with jitter,
 * honouring `retry-after` when the API sends one.
 */

import { GcpApiError, isJsonObject } from "./api.js";
import type { GcpRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<GcpRetryOptions>;

export const GCP_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * GCP and socket error codes that are safe to retry.
 */
export const GCP_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "UNAVAILABLE",
  "DEADLINE_EXCEEDED",
  "RESOURCE_EXHAUSTED",
  "ABORTED",
  "INTERNAL",
  "rateLimitExceeded",
  "backendError",
  "internalError",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "too many requests",
  "rate limit",
  "quota exceeded",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "network error",
  "fetch failed",
  "deadline exceeded",
  "backend error",
];

// =============================================================================
// Error Checking
// =============================================================================

function errorCode(error: unknown): string {
  if (error instanceof GcpApiError) return error.code;
  if (isJsonObject(error) || error instanceof Error) {
    const code: unknown = Reflect.get(error, "code");
    return typeof code === "string" ? code : "";
  }
  return "";
}

function errorStatus(error: unknown): number {
  if (error instanceof GcpApiError) return error.statusCode;
  if (isJsonObject(error)) {
    const status = error.statusCode ?? error.status;
    return typeof status === "number" ? status : 0;
  }
  return 0;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isJsonObject(error) && typeof error.message === "string") return error.message;
  return "";
}

/**
 * Determine whether a GCP error is safe to retry.
 */
export function shouldRetryGcpError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  const code = errorCode(error);
  if (code && GCP_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const status = errorStatus(error);
  if (status === 429) return true;
  if (status >= 500 && status < 600) return true;

  const message = errorMessage(error).toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Extract the Retry-After delay from a GCP error (in ms).
 */
export function getGcpRetryAfterMs(error: unknown, now: number = Date.now()): number | null {
  if (!(error instanceof GcpApiError)) return null;

  const retryAfter = error.headers["retry-after"];
  if (!retryAfter) return null;

  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

export function resolveRetryConfig(options?: GcpRetryOptions): RetryConfig {
  return {
    maxAttempts: options?.maxAttempts ?? GCP_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? GCP_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? GCP_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? GCP_RETRY_DEFAULTS.jitterFactor,
  };
}

/**
 * Execute a function with GCP-specific retry logic.
 */
export async function withGcpRetry<T>(
  fn: () => Promise<T>,
  options?: GcpRetryOptions,
): Promise<T> {
  const config = resolveRetryConfig(options);
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryGcpError(error)) break;

      const retryAfterMs = getGcpRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = Math.min(retryAfterMs, config.maxDelayMs);
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format a GCP error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = errorCode(error);
  const status = errorStatus(error);
  const message = errorMessage(error) || "Unknown error";

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (status) parts.push(`(HTTP ${status})`);
  parts.push(message);

  return parts.join(" ");
}
