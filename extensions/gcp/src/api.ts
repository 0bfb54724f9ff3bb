/**
 * GCP Extension: REST API Request Helpers
 *
 * Shared utilities for making authenticated requests to GCP REST APIs.
 * Uses native `fetch()` with Bearer token auth, no SDK needed.
 */

import type { JsonObject } from "./types.js";

// =============================================================================
// Errors
// =============================================================================

/** Error raised for a non-2xx response from a GCP REST API. */
export class GcpApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public headers: Record<string, string> = {},
  ) {
    super(message);
    this.name = "GcpApiError";
  }
}

export type GcpRequestOptions = {
  method?: string;
  body?: unknown;
  headers?: Record<string, string>;
  timeout?: number;
};

// =============================================================================
// JSON narrowing
// =============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read a string field; numbers are stringified (GCP encodes int64 as strings and numbers alike). */
export function readString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

export function readNumber(obj: JsonObject, key: string): number | undefined {
  const value = obj[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

export function readObjects(obj: JsonObject, key: string): JsonObject[] {
  const value = obj[key];
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

export function readStrings(obj: JsonObject, key: string): string[] {
  const value = obj[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

// =============================================================================
// Core Request
// =============================================================================

/**
 * Make an authenticated request to a GCP REST API endpoint.
 *
 * @param url   - Full REST API URL.
 * @param token - OAuth2 access token (Bearer).
 * @returns Parsed JSON response body; `{}` for empty responses.
 */
export async function gcpRequest(
  url: string,
  token: string,
  opts?: GcpRequestOptions,
): Promise<JsonObject> {
  const controller = new AbortController();
  const timeoutMs = opts?.timeout ?? 30_000;
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      method: opts?.method ?? "GET",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
        Accept: "application/json",
        ...opts?.headers,
      },
      body: opts?.body ? JSON.stringify(opts.body) : undefined,
      signal: controller.signal,
    });

    if (!res.ok) {
      const errBody: unknown = await res.json().catch(() => ({}));
      const errObj = isJsonObject(errBody) && isJsonObject(errBody.error) ? errBody.error : {};
      const message = readString(errObj, "message") ?? `GCP API error: HTTP ${res.status}`;
      const code = readString(errObj, "status") ?? readString(errObj, "code") ?? "";
      const headers: Record<string, string> = {};
      // Retry logic honours retry-after
      const retryAfter = res.headers.get("retry-after");
      if (retryAfter) headers["retry-after"] = retryAfter;
      throw new GcpApiError(message, res.status, code, headers);
    }

    if (res.status === 204) return {};
    if (res.headers.get("content-length") === "0") return {};

    const data: unknown = await res.json();
    return isJsonObject(data) ? data : {};
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Paginated List
// =============================================================================

function withPageToken(url: string, pageToken: string | undefined): string {
  if (!pageToken) return url;
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}pageToken=${encodeURIComponent(pageToken)}`;
}

/**
 * Fetch all pages of a GCP list API, accumulating items under `listKey`.
 *
 * @param maxPages - Safety limit on pages (default 50).
 */
export async function gcpList(
  url: string,
  token: string,
  listKey: string,
  maxPages = 50,
): Promise<JsonObject[]> {
  const results: JsonObject[] = [];
  let pageToken: string | undefined;
  let page = 0;

  do {
    const data = await gcpRequest(withPageToken(url, pageToken), token);
    results.push(...readObjects(data, listKey));
    pageToken = readString(data, "nextPageToken");
    page++;
  } while (pageToken && page < maxPages);

  return results;
}

// =============================================================================
// Aggregated List (Compute-style)
// =============================================================================

/**
 * Fetch all items from a Compute Engine aggregated list endpoint.
 *
 * Aggregated list responses group items by scope (zone/region), e.g.:
 * `{ items: { "zones/us-central1-a": { instances: [...] } } }`
 */
export async function gcpAggregatedList(
  url: string,
  token: string,
  itemKey: string,
): Promise<JsonObject[]> {
  const results: JsonObject[] = [];
  let pageToken: string | undefined;

  do {
    const data = await gcpRequest(withPageToken(url, pageToken), token);
    const scopes = isJsonObject(data.items) ? data.items : {};

    for (const scope of Object.values(scopes)) {
      if (isJsonObject(scope)) results.push(...readObjects(scope, itemKey));
    }

    pageToken = readString(data, "nextPageToken");
  } while (pageToken);

  return results;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Extract the short name from a GCP resource self-link or full path.
 * e.g. "projects/my-proj/zones/us-central1-a/machineTypes/e2-micro" → "e2-micro"
 */
export function shortName(fullPath: string): string {
  return fullPath.split("/").pop() ?? fullPath;
}
