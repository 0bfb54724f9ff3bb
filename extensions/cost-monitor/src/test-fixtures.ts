/**
 * Shared fakes for cost monitor tests: a small project inventory served
 * from memory.
 */

import { vi } from "vitest";

import { GcpApiError } from "../../gcp/src/api.js";
import type { GcpComputeInstance, GcpDisk } from "../../gcp/src/compute/index.js";
import type { GcpAddress } from "../../gcp/src/network/index.js";
import { GcpInventory, type InventoryClients } from "./inventory.js";
import { createRateTable } from "./rates.js";

export const testRates = createRateTable({
  machineTypes: { "e2-micro": "6.00", "e2-small": "12.23", "e2-medium": "24.46" },
  staticIpMonthly: "7.30",
  standardDiskGbMonthly: "0.04",
  ssdDiskGbMonthly: "0.17",
  networkFreeTierGb: "1",
  networkEgressPerGb: "0.12",
});

export function testInstance(name: string, overrides: Partial<GcpComputeInstance> = {}): GcpComputeInstance {
  return {
    name,
    zone: "us-central1-a",
    machineType: "e2-micro",
    status: "RUNNING",
    networkInterfaces: [{ network: "default", networkIP: "10.128.0.2", externalIPs: [] }],
    disks: [],
    labels: {},
    createdAt: "2026-01-15T08:00:00.000-08:00",
    ...overrides,
  };
}

export type FakeProject = {
  instances: GcpComputeInstance[];
  addresses: GcpAddress[];
  disks: GcpDisk[];
};

/**
 * `web-1` runs with an external IP and a 10 GB boot disk, `old-1` is
 * stopped, one address is reserved but unused and a 20 GB SSD is detached.
 */
export function sampleProject(): FakeProject {
  return {
    instances: [
      testInstance("web-1", {
        networkInterfaces: [{ network: "default", networkIP: "10.128.0.2", externalIPs: ["203.0.113.10"] }],
        disks: [{ diskName: "web-1", deviceName: "persistent-disk-0", boot: true, sizeGb: 10 }],
        lastStartedAt: "2026-03-07T06:00:00.000Z",
      }),
      testInstance("old-1", { machineType: "e2-small", status: "TERMINATED" }),
    ],
    addresses: [
      { name: "ip-web", address: "203.0.113.10", region: "us-central1", status: "IN_USE", addressType: "EXTERNAL", users: ["web-1"] },
      { name: "ip-spare", address: "203.0.113.20", region: "us-central1", status: "RESERVED", addressType: "EXTERNAL", users: [] },
    ],
    disks: [
      { name: "web-1", zone: "us-central1-a", sizeGb: 10, type: "pd-standard", status: "READY", users: ["web-1"] },
      { name: "data-1", zone: "us-central1-a", sizeGb: 20, type: "pd-ssd", status: "READY", users: [] },
    ],
  };
}

function notFound(name: string): GcpApiError {
  return new GcpApiError(`The resource '${name}' was not found`, 404, "NOT_FOUND");
}

export function fakeClients(project: FakeProject = sampleProject()): InventoryClients {
  return {
    compute: {
      getInstance: vi.fn(async (_zone: string, name: string) => {
        const found = project.instances.find((i) => i.name === name);
        if (!found) throw notFound(name);
        return found;
      }),
      listInstances: vi.fn(async (opts?: { filter?: string }) =>
        opts?.filter === "status = TERMINATED"
          ? project.instances.filter((i) => i.status === "TERMINATED")
          : project.instances,
      ),
      listDisks: vi.fn(async () => project.disks),
      getDisk: vi.fn(async (_zone: string, name: string) => {
        const found = project.disks.find((d) => d.name === name);
        if (!found) throw notFound(name);
        return found;
      }),
    },
    network: {
      listAddresses: vi.fn(async () => project.addresses),
    },
  };
}

export function fakeInventory(project?: FakeProject): GcpInventory {
  return new GcpInventory(fakeClients(project), "us-central1-a");
}
