/**
 * GCP Extension: Compute Engine Manager
 *
 * Read-only access to Compute Engine instances and persistent disks.
 */

import { gcpAggregatedList, gcpList, gcpRequest, readNumber, readObjects, readString, shortName } from "../api.js";
import { withGcpRetry } from "../retry.js";
import type { AccessTokenProvider, GcpRetryOptions, JsonObject } from "../types.js";

const COMPUTE_BASE = "https://compute.googleapis.com/compute/v1";

// =============================================================================
// Types
// =============================================================================

/** Network interface attached to a Compute Engine instance. */
export type GcpNetworkInterface = {
  network: string;
  networkIP?: string;
  /** External (NAT) addresses from the interface's access configs. */
  externalIPs: string[];
};

/** Disk attachment on a Compute Engine instance. */
export type GcpAttachedDisk = {
  /** Short name of the source disk. */
  diskName: string;
  deviceName: string;
  boot: boolean;
  sizeGb?: number;
};

/** A Compute Engine virtual machine instance. */
export type GcpComputeInstance = {
  name: string;
  zone: string;
  machineType: string;
  status: string;
  networkInterfaces: GcpNetworkInterface[];
  disks: GcpAttachedDisk[];
  labels: Record<string, string>;
  createdAt: string;
  lastStartedAt?: string;
};

/** A Compute Engine persistent disk. */
export type GcpDisk = {
  name: string;
  zone: string;
  sizeGb?: number;
  /** Short disk type name, e.g. `pd-standard` or `pd-ssd`. */
  type: string;
  status: string;
  /** Short names of the instances using the disk. */
  users: string[];
};

export type ListOptions = {
  zone?: string;
  /** Compute Engine list filter expression, e.g. `status = TERMINATED`. */
  filter?: string;
};

// =============================================================================
// GcpComputeManager
// =============================================================================

export class GcpComputeManager {
  constructor(
    private readonly projectId: string,
    private readonly getAccessToken: AccessTokenProvider,
    private readonly retryOptions: GcpRetryOptions = {},
  ) {}

  /**
   * List Compute Engine instances, in one zone or across all zones.
   */
  async listInstances(opts?: ListOptions): Promise<GcpComputeInstance[]> {
    return withGcpRetry(async () => {
      const token = await this.getAccessToken();
      const items = opts?.zone
        ? await gcpList(this.url(`zones/${opts.zone}/instances`, opts.filter), token, "items")
        : await gcpAggregatedList(this.url("aggregated/instances", opts?.filter), token, "instances");
      return items.map(mapInstance);
    }, this.retryOptions);
  }

  async getInstance(zone: string, name: string): Promise<GcpComputeInstance> {
    return withGcpRetry(async () => {
      const token = await this.getAccessToken();
      const raw = await gcpRequest(this.url(`zones/${zone}/instances/${encodeURIComponent(name)}`), token);
      return mapInstance(raw);
    }, this.retryOptions);
  }

  /**
   * List persistent disks, in one zone or across all zones.
   */
  async listDisks(opts?: ListOptions): Promise<GcpDisk[]> {
    return withGcpRetry(async () => {
      const token = await this.getAccessToken();
      const items = opts?.zone
        ? await gcpList(this.url(`zones/${opts.zone}/disks`, opts.filter), token, "items")
        : await gcpAggregatedList(this.url("aggregated/disks", opts?.filter), token, "disks");
      return items.map(mapDisk);
    }, this.retryOptions);
  }

  async getDisk(zone: string, name: string): Promise<GcpDisk> {
    return withGcpRetry(async () => {
      const token = await this.getAccessToken();
      const raw = await gcpRequest(this.url(`zones/${zone}/disks/${encodeURIComponent(name)}`), token);
      return mapDisk(raw);
    }, this.retryOptions);
  }

  private url(path: string, filter?: string): string {
    const base = `${COMPUTE_BASE}/projects/${this.projectId}/${path}`;
    return filter ? `${base}?filter=${encodeURIComponent(filter)}` : base;
  }
}

// -----------------------------------------------------------------------------
// Mapping helpers
// -----------------------------------------------------------------------------

function mapLabels(raw: JsonObject): Record<string, string> {
  const labels: Record<string, string> = {};
  const value = raw.labels;
  if (typeof value !== "object" || value === null) return labels;
  for (const [key, label] of Object.entries(value)) {
    if (typeof label === "string") labels[key] = label;
  }
  return labels;
}

function mapInstance(raw: JsonObject): GcpComputeInstance {
  return {
    name: readString(raw, "name") ?? "",
    zone: shortName(readString(raw, "zone") ?? ""),
    machineType: shortName(readString(raw, "machineType") ?? ""),
    status: readString(raw, "status") ?? "",
    networkInterfaces: readObjects(raw, "networkInterfaces").map((ni) => ({
      network: shortName(readString(ni, "network") ?? ""),
      networkIP: readString(ni, "networkIP"),
      externalIPs: readObjects(ni, "accessConfigs")
        .map((ac) => readString(ac, "natIP"))
        .filter((ip): ip is string => ip !== undefined),
    })),
    disks: readObjects(raw, "disks").map((d) => ({
      diskName: shortName(readString(d, "source") ?? readString(d, "deviceName") ?? ""),
      deviceName: readString(d, "deviceName") ?? "",
      boot: d.boot === true,
      sizeGb: readNumber(d, "diskSizeGb"),
    })),
    labels: mapLabels(raw),
    createdAt: readString(raw, "creationTimestamp") ?? "",
    lastStartedAt: readString(raw, "lastStartTimestamp"),
  };
}

function mapDisk(raw: JsonObject): GcpDisk {
  return {
    name: readString(raw, "name") ?? "",
    zone: shortName(readString(raw, "zone") ?? ""),
    sizeGb: readNumber(raw, "sizeGb"),
    type: shortName(readString(raw, "type") ?? ""),
    status: readString(raw, "status") ?? "",
    users: (Array.isArray(raw.users) ? raw.users : [])
      .filter((u): u is string => typeof u === "string")
      .map(shortName),
  };
}

/** Primary external IP of an instance, if it has one. */
export function externalIpOf(instance: GcpComputeInstance): string | undefined {
  return instance.networkInterfaces[0]?.externalIPs[0];
}

export function createComputeManager(
  projectId: string,
  getAccessToken: AccessTokenProvider,
  retryOptions?: GcpRetryOptions,
): GcpComputeManager {
  return new GcpComputeManager(projectId, getAccessToken, retryOptions);
}
