/**
 * Per-instance cost breakdown: VM, external IP and attached disks.
 */

import type Decimal from "decimal.js-light";

import { externalIpOf, type GcpComputeInstance } from "../../gcp/src/compute/index.js";
import { NotFoundError, UnreachableError } from "./errors.js";
import { dailyComputeCost, dailyDiskCost, dailyStaticIpCost, RUNNING } from "./estimator.js";
import { instanceRecord, skippedFrom, type GcpInventory } from "./inventory.js";
import { formatUsd, roundCents, sum } from "./money.js";
import type { RateTable } from "./rates.js";
import type { SkippedResource } from "./types.js";

export type InstanceCostLine = { label: string; daily: Decimal };

export type InstanceCost = {
  instance: GcpComputeInstance;
  lines: InstanceCostLine[];
  total: Decimal;
};

export type InstanceCostReport = {
  instances: InstanceCost[];
  skipped: SkippedResource[];
  grandTotal: Decimal;
  threshold: Decimal;
  exceeded: boolean;
};

export type InstanceCostDeps = {
  inventory: Pick<GcpInventory, "describeInstances" | "getDisk">;
  rates: RateTable;
  dailyThreshold: Decimal;
};

function isInventoryError(err: unknown): err is NotFoundError | UnreachableError {
  return err instanceof NotFoundError || err instanceof UnreachableError;
}

export async function checkInstanceCosts(
  names: readonly string[],
  deps: InstanceCostDeps,
): Promise<InstanceCostReport> {
  const { instances, skipped } = await deps.inventory.describeInstances(names);
  const costs: InstanceCost[] = [];

  for (const instance of instances) {
    const lines: InstanceCostLine[] = [
      { label: `VM (${instance.machineType})`, daily: dailyComputeCost(instanceRecord(instance), deps.rates).daily },
    ];

    if (externalIpOf(instance)) {
      const ip = dailyStaticIpCost({ kind: "static_ip", name: instance.name, status: "IN_USE" }, deps.rates);
      lines.push({ label: "Static IP", daily: roundCents(ip.daily) });
    }

    for (const attached of instance.disks) {
      try {
        const disk = await deps.inventory.getDisk(instance.zone, attached.diskName);
        const size = disk.sizeGb === undefined ? "?" : `${disk.sizeGb}GB`;
        lines.push({
          label: `Disk (${disk.name} - ${size} ${disk.typeName ?? disk.diskType ?? "standard"})`,
          daily: roundCents(dailyDiskCost(disk, deps.rates).daily),
        });
      } catch (err) {
        if (!isInventoryError(err)) throw err;
        skipped.push(skippedFrom(err));
      }
    }

    costs.push({ instance, lines, total: sum(lines.map((line) => line.daily)) });
  }

  const grandTotal = sum(costs.map((cost) => cost.total));
  return {
    instances: costs,
    skipped,
    grandTotal,
    threshold: deps.dailyThreshold,
    exceeded: grandTotal.gt(deps.dailyThreshold),
  };
}

/** `3d 6h` since the last start. */
export function formatUptime(startedAt: string | undefined, nowMs: number): string {
  const started = startedAt ? Date.parse(startedAt) : Number.NaN;
  if (Number.isNaN(started)) return "Unknown";
  const seconds = Math.max(0, Math.floor((nowMs - started) / 1000));
  return `${Math.floor(seconds / 86_400)}d ${Math.floor((seconds % 86_400) / 3600)}h`;
}

export function renderInstanceCosts(report: InstanceCostReport, projectId: string, nowMs: number = Date.now()): string {
  const rule = "===================================";
  const out: string[] = [rule, "GCP Instance Cost Analysis", rule, ""];

  for (const { instance, lines, total } of report.instances) {
    out.push(`INSTANCE: ${instance.name}`, "-----------------------------------");
    out.push(
      `Status: ${instance.status}`,
      `Machine Type: ${instance.machineType}`,
      `Zone: ${instance.zone}`,
      `Created: ${instance.createdAt.slice(0, 10)}`,
    );
    if (instance.lastStartedAt) {
      out.push(
        `Last Started: ${instance.lastStartedAt.slice(0, 19)}`,
        `Uptime: ${formatUptime(instance.lastStartedAt, nowMs)}`,
      );
    }
    out.push(
      `Internal IP: ${instance.networkInterfaces[0]?.networkIP ?? "None"}`,
      `External IP: ${externalIpOf(instance) ?? "None"}`,
      "",
      "COST BREAKDOWN:",
      "---------------",
    );
    for (const line of lines) out.push(`${line.label}: ${formatUsd(line.daily)}/day`);
    out.push("", `Instance Daily Total: ${formatUsd(total)}`, "");

    if (instance.status === RUNNING) {
      out.push(
        "PERFORMANCE METRICS:",
        "-------------------",
        "CPU/Memory metrics require Monitoring API access",
        `View in console: https://console.cloud.google.com/compute/instancesDetail/zones/${instance.zone}/instances/${instance.name}?project=${projectId}`,
        "",
      );
    }
    out.push(rule, "");
  }

  for (const skipped of report.skipped) out.push(`Error: ${skipped.detail}`, "");

  out.push(`TOTAL DAILY COST (all instances): ${formatUsd(report.grandTotal)}`, "");
  if (report.exceeded) {
    out.push(`⚠️  WARNING: Daily cost exceeds threshold of ${formatUsd(report.threshold)}`, "");
  }

  out.push(
    "OPTIMIZATION TIPS:",
    "-----------------",
    "1. Use committed use discounts for predictable workloads",
    "2. Schedule non-critical instances to shut down outside business hours",
    "3. Right-size instances based on actual CPU/memory usage",
    "4. Use preemptible instances for fault-tolerant workloads",
    "5. Delete unattached disks and unused static IPs",
  );
  return out.join("\n");
}
