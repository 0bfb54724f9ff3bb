/**
 * GCP Extension: Networking Manager
 *
 * Reserved static addresses (regional and global).
 */

import { gcpAggregatedList, gcpList, readString, readStrings, shortName } from "../api.js";
import { withGcpRetry } from "../retry.js";
import type { AccessTokenProvider, GcpRetryOptions, JsonObject } from "../types.js";

// =============================================================================
// Types
// =============================================================================

/** A reserved static address. */
export type GcpAddress = {
  name: string;
  address: string;
  /** Region short name; `global` for global addresses. */
  region: string;
  /** `RESERVED` (held but unattached), `IN_USE` or `RESERVING`. */
  status: string;
  addressType: "INTERNAL" | "EXTERNAL";
  users: string[];
};

// =============================================================================
// GcpNetworkManager
// =============================================================================

export class GcpNetworkManager {
  constructor(
    private readonly projectId: string,
    private readonly getAccessToken: AccessTokenProvider,
    private readonly retryOptions: GcpRetryOptions = {},
  ) {}

  /**
   * List reserved addresses across every region, or within one region.
   * Global addresses are included when no region is given.
   */
  async listAddresses(opts?: { region?: string; status?: string }): Promise<GcpAddress[]> {
    return withGcpRetry(async () => {
      const token = await this.getAccessToken();
      const base = `https://compute.googleapis.com/compute/v1/projects/${this.projectId}`;
      const query = opts?.status ? `?filter=${encodeURIComponent(`status = ${opts.status}`)}` : "";

      if (opts?.region) {
        const raw = await gcpList(`${base}/regions/${opts.region}/addresses${query}`, token, "items");
        return raw.map(mapAddress);
      }

      // Aggregated list covers the `global` scope too.
      const raw = await gcpAggregatedList(`${base}/aggregated/addresses${query}`, token, "addresses");
      return raw.map(mapAddress);
    }, this.retryOptions);
  }
}

function mapAddress(raw: JsonObject): GcpAddress {
  const region = readString(raw, "region");
  return {
    name: readString(raw, "name") ?? "",
    address: readString(raw, "address") ?? "",
    region: region ? shortName(region) : "global",
    status: readString(raw, "status") ?? "",
    addressType: readString(raw, "addressType") === "INTERNAL" ? "INTERNAL" : "EXTERNAL",
    users: readStrings(raw, "users").map(shortName),
  };
}

export function createNetworkManager(
  projectId: string,
  getAccessToken: AccessTokenProvider,
  retryOptions?: GcpRetryOptions,
): GcpNetworkManager {
  return new GcpNetworkManager(projectId, getAccessToken, retryOptions);
}
