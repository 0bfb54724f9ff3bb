import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  GcpApiError,
  gcpAggregatedList,
  gcpList,
  gcpRequest,
  readNumber,
  readObjects,
  readString,
  readStrings,
  shortName,
} from "./api.js";

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
});

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

// ===========================================================================
// gcpRequest
// ===========================================================================

describe("gcpRequest", () => {
  it("sends a GET with bearer token by default", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ name: "vm-1" }));

    const result = await gcpRequest("https://compute.googleapis.com/compute/v1/x", "tok123");

    expect(result).toEqual({ name: "vm-1" });
    expect(mockFetch).toHaveBeenCalledOnce();
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://compute.googleapis.com/compute/v1/x");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toMatchObject({
      Authorization: "Bearer tok123",
      "Content-Type": "application/json",
    });
  });

  it("serialises a JSON body", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ done: true }));

    await gcpRequest("https://example.com/api", "t", { method: "POST", body: { key: "val" } });

    const [, init] = mockFetch.mock.calls[0];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ key: "val" }));
  });

  it("throws GcpApiError with status and code on non-ok response", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ error: { message: "The resource 'vm-9' was not found", status: "NOT_FOUND" } }, 404),
    );

    const error = await gcpRequest("https://x.com/v1/y", "t").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GcpApiError);
    if (!(error instanceof GcpApiError)) return;
    expect(error.message).toBe("The resource 'vm-9' was not found");
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe("NOT_FOUND");
  });

  it("falls back to a generic message when the error body is not JSON", async () => {
    mockFetch.mockResolvedValueOnce(new Response("upstream failure", { status: 502 }));

    await expect(gcpRequest("https://x.com/v1/y", "t")).rejects.toThrow("GCP API error: HTTP 502");
  });

  it("returns an empty object for 204 No Content", async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    expect(await gcpRequest("https://x.com/v1/y", "t")).toEqual({});
  });

  it("returns an empty object for a non-object JSON body", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([1, 2, 3]));

    expect(await gcpRequest("https://x.com/v1/y", "t")).toEqual({});
  });

  it("keeps the retry-after header on the error", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ error: { message: "Rate limited", status: "RESOURCE_EXHAUSTED" } }, 429, { "retry-after": "30" }),
    );

    const error = await gcpRequest("https://x.com/v1/y", "t").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GcpApiError);
    if (error instanceof GcpApiError) {
      expect(error.headers).toEqual({ "retry-after": "30" });
    }
  });

  it("aborts on timeout via AbortController", async () => {
    mockFetch.mockImplementation(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );

    await expect(gcpRequest("https://x.com/v1/y", "t", { timeout: 1 })).rejects.toThrow("aborted");
  });
});

// ===========================================================================
// gcpList
// ===========================================================================

describe("gcpList", () => {
  it("returns items from a single page", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ items: [{ name: "a" }, { name: "b" }] }));

    expect(await gcpList("https://x.com/v1/items", "t", "items")).toEqual([{ name: "a" }, { name: "b" }]);
  });

  it("paginates using nextPageToken", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ items: [{ id: 1 }], nextPageToken: "page2" }))
      .mockResolvedValueOnce(jsonResponse({ items: [{ id: 2 }] }));

    const items = await gcpList("https://x.com/v1/items", "t", "items");

    expect(items).toEqual([{ id: 1 }, { id: 2 }]);
    expect(mockFetch.mock.calls[1][0]).toBe("https://x.com/v1/items?pageToken=page2");
  });

  it("uses & when the URL already has query params", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ items: [], nextPageToken: "p2" }))
      .mockResolvedValueOnce(jsonResponse({ items: [] }));

    await gcpList("https://x.com/v1/items?filter=status%3DRESERVED", "t", "items");

    expect(mockFetch.mock.calls[1][0]).toBe("https://x.com/v1/items?filter=status%3DRESERVED&pageToken=p2");
  });

  it("stops at maxPages", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ items: [{ id: 1 }], nextPageToken: "more" }));

    const items = await gcpList("https://x.com/v1/items", "t", "items", 2);

    expect(items).toHaveLength(2);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("drops non-object entries", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ items: [{ id: 1 }, "junk", null] }));

    expect(await gcpList("https://x.com/v1/items", "t", "items")).toEqual([{ id: 1 }]);
  });
});

// ===========================================================================
// gcpAggregatedList
// ===========================================================================

describe("gcpAggregatedList", () => {
  it("collects items from every scope and skips scopes without results", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        items: {
          "regions/us-central1": { addresses: [{ name: "ip-1" }] },
          "regions/us-east1": { warning: { code: "NO_RESULTS_ON_PAGE" } },
          "regions/europe-west1": { addresses: [{ name: "ip-2" }] },
        },
      }),
    );

    const items = await gcpAggregatedList("https://x.com/v1/aggregated/addresses", "t", "addresses");

    expect(items).toEqual([{ name: "ip-1" }, { name: "ip-2" }]);
  });

  it("paginates aggregated results", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ items: { "zones/a": { disks: [{ name: "d1" }] } }, nextPageToken: "p2" }))
      .mockResolvedValueOnce(jsonResponse({ items: { "zones/b": { disks: [{ name: "d2" }] } } }));

    const items = await gcpAggregatedList("https://x.com/v1/agg", "t", "disks");

    expect(items).toEqual([{ name: "d1" }, { name: "d2" }]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });
});

// ===========================================================================
// Helpers
// ===========================================================================

describe("shortName", () => {
  it("extracts the last segment of a resource path", () => {
    expect(shortName("projects/p/zones/us-central1-a/machineTypes/e2-micro")).toBe("e2-micro");
  });

  it("returns the input when there are no slashes", () => {
    expect(shortName("simple-name")).toBe("simple-name");
  });
});

describe("JSON readers", () => {
  const obj = { name: "disk-1", sizeGb: "20", count: 3, tags: ["a", 1, "b"], nested: [{ x: 1 }, 2] };

  it("reads strings and stringified numbers", () => {
    expect(readString(obj, "name")).toBe("disk-1");
    expect(readString(obj, "count")).toBe("3");
    expect(readString(obj, "missing")).toBeUndefined();
  });

  it("reads numbers from numbers and numeric strings", () => {
    expect(readNumber(obj, "sizeGb")).toBe(20);
    expect(readNumber(obj, "count")).toBe(3);
    expect(readNumber(obj, "name")).toBeUndefined();
  });

  it("filters arrays by element type", () => {
    expect(readStrings(obj, "tags")).toEqual(["a", "b"]);
    expect(readObjects(obj, "nested")).toEqual([{ x: 1 }]);
  });
});
