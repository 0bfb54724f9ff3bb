/**
 * Inventory adapter: Compute Engine instances, disks and reserved addresses
 * as resource records, with per-resource failures collected rather than
 * thrown.
 */

import { GcpApiError } from "../../gcp/src/api.js";
import type { GcpComputeInstance, GcpComputeManager, GcpDisk } from "../../gcp/src/compute/index.js";
import type { GcpAddress, GcpNetworkManager } from "../../gcp/src/network/index.js";
import { formatErrorMessage } from "../../gcp/src/retry.js";
import { NotFoundError, UnreachableError } from "./errors.js";
import { RESERVED, TERMINATED } from "./estimator.js";
import { classifyDiskType } from "./rates.js";
import type {
  ComputeInstanceRecord,
  DiskRecord,
  ResourceRecord,
  SkippedResource,
  StaticIpRecord,
} from "./types.js";

export type InventoryClients = {
  compute: Pick<GcpComputeManager, "getInstance" | "listInstances" | "listDisks" | "getDisk">;
  network: Pick<GcpNetworkManager, "listAddresses">;
};

// =============================================================================
// Record mapping
// =============================================================================

export function instanceRecord(instance: GcpComputeInstance): ComputeInstanceRecord {
  return {
    kind: "compute_instance",
    name: instance.name,
    status: instance.status,
    machineType: instance.machineType || undefined,
    zone: instance.zone || undefined,
  };
}

export function addressRecord(address: GcpAddress): StaticIpRecord {
  return {
    kind: "static_ip",
    name: address.name,
    status: address.status,
    address: address.address || undefined,
    region: address.region,
  };
}

export function diskRecord(disk: GcpDisk): DiskRecord {
  return {
    kind: "disk",
    name: disk.name,
    status: disk.status,
    sizeGb: disk.sizeGb,
    diskType: classifyDiskType(disk.type),
    typeName: disk.type || undefined,
    zone: disk.zone || undefined,
  };
}

/** HTTP 404 means the resource is gone; anything else means we could not ask. */
export function toInventoryError(resource: string, err: unknown): NotFoundError | UnreachableError {
  if (err instanceof GcpApiError && err.statusCode === 404) return new NotFoundError(resource, { cause: err });
  return new UnreachableError(resource, formatErrorMessage(err), { cause: err });
}

export function skippedFrom(err: NotFoundError | UnreachableError): SkippedResource {
  return err instanceof NotFoundError
    ? { resource: err.resource, reason: "not_found", detail: err.message }
    : { resource: err.resource, reason: "unreachable", detail: err.message };
}

function isInventoryError(err: unknown): err is NotFoundError | UnreachableError {
  return err instanceof NotFoundError || err instanceof UnreachableError;
}

// =============================================================================
// GcpInventory
// =============================================================================

export class GcpInventory {
  constructor(
    private readonly clients: InventoryClients,
    readonly zone: string,
  ) {}

  private async guard<T>(resource: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toInventoryError(resource, err);
    }
  }

  /** @throws NotFoundError | UnreachableError */
  describeInstance(name: string, zone: string = this.zone): Promise<GcpComputeInstance> {
    return this.guard(name, () => this.clients.compute.getInstance(zone, name));
  }

  async describeInstances(
    names: readonly string[],
  ): Promise<{ instances: GcpComputeInstance[]; skipped: SkippedResource[] }> {
    const instances: GcpComputeInstance[] = [];
    const skipped: SkippedResource[] = [];
    for (const name of names) {
      try {
        instances.push(await this.describeInstance(name));
      } catch (err) {
        if (!isInventoryError(err)) throw err;
        skipped.push(skippedFrom(err));
      }
    }
    return { instances, skipped };
  }

  /** Every reserved address in the project, regional and global. */
  async listStaticIps(): Promise<StaticIpRecord[]> {
    const addresses = await this.guard("static IP list", () => this.clients.network.listAddresses());
    return addresses.map(addressRecord);
  }

  async listDisks(): Promise<DiskRecord[]> {
    const disks = await this.guard("disk list", () => this.clients.compute.listDisks());
    return disks.map(diskRecord);
  }

  getDisk(zone: string, name: string): Promise<DiskRecord> {
    return this.guard(name, async () => diskRecord(await this.clients.compute.getDisk(zone, name)));
  }

  /** Names of instances that are stopped but keep their disks. */
  async listStoppedInstances(): Promise<string[]> {
    const stopped = await this.guard("instance list", () =>
      this.clients.compute.listInstances({ filter: `status = ${TERMINATED}` }),
    );
    return stopped.map((instance) => instance.name);
  }
}

// =============================================================================
// Snapshot
// =============================================================================

export type InventorySnapshot = {
  /** Records to price, limited to the enabled categories. */
  records: ResourceRecord[];
  instances: GcpComputeInstance[];
  staticIps: StaticIpRecord[];
  unusedStaticIps: StaticIpRecord[];
  stoppedInstances: string[];
  skipped: SkippedResource[];
};

export type SnapshotOptions = {
  instances: readonly string[];
  monitor: { compute: boolean; staticIp: boolean; storage: boolean };
};

/**
 * Gather everything a run prices. Address and stopped-instance listings
 * are always taken since the optimisation checks use them; a listing that
 * fails is reported as skipped.
 */
export async function snapshotInventory(inventory: GcpInventory, options: SnapshotOptions): Promise<InventorySnapshot> {
  const skipped: SkippedResource[] = [];
  const records: ResourceRecord[] = [];

  const listOrSkip = async <T>(fn: () => Promise<T[]>): Promise<T[]> => {
    try {
      return await fn();
    } catch (err) {
      if (!isInventoryError(err)) throw err;
      skipped.push(skippedFrom(err));
      return [];
    }
  };

  let instances: GcpComputeInstance[] = [];
  if (options.monitor.compute) {
    const described = await inventory.describeInstances(options.instances);
    instances = described.instances;
    skipped.push(...described.skipped);
    records.push(...instances.map(instanceRecord));
  }

  const staticIps = await listOrSkip(() => inventory.listStaticIps());
  if (options.monitor.staticIp) records.push(...staticIps);

  if (options.monitor.storage) records.push(...(await listOrSkip(() => inventory.listDisks())));

  const stoppedInstances = await listOrSkip(() => inventory.listStoppedInstances());

  return {
    records,
    instances,
    staticIps,
    unusedStaticIps: staticIps.filter((ip) => ip.status === RESERVED),
    stoppedInstances,
    skipped,
  };
}
