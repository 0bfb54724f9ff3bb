/**
 * Network usage collection: probe each running instance over the remote
 * channel and price its egress.
 */

import type Decimal from "decimal.js-light";

import type { GcpComputeInstance } from "../../gcp/src/compute/index.js";
import type { RemoteExecutor } from "../../gcp/src/ssh/index.js";
import { formatLocalTimestamp, type Logger } from "../../../src/logging/logger.js";
import { bytesToGb, bytesToGbExact, formatBytes, priceEgress, priceEgressGb } from "./egress.js";
import { NotFoundError, UnreachableError, errorMessage } from "./errors.js";
import { RUNNING } from "./estimator.js";
import { skippedFrom, type GcpInventory } from "./inventory.js";
import { formatUsd, sum } from "./money.js";
import { NETWORK_PROBE_SCRIPT, parseProbeOutput } from "./network-probe.js";
import type { RateTable } from "./rates.js";
import type { SkippedResource } from "./types.js";

const MS_PER_DAY = 86_400_000;

export type InstanceNetworkUsage = {
  instance: string;
  interface?: string;
  rxBytes: number;
  txBytes: number;
  rxRate?: number;
  txRate?: number;
  egressCost: Decimal;
  /** Whole days since the instance last started. */
  uptimeDays: number;
  /** Present once the instance has been up for a full day. */
  dailyAverageGb?: Decimal;
  dailyCost?: Decimal;
};

export type NetworkUsageReport = {
  instances: InstanceNetworkUsage[];
  skipped: SkippedResource[];
  totalRxBytes: number;
  totalTxBytes: number;
  totalEgressGb: Decimal;
  totalEgressCost: Decimal;
  /** Sum of the per-instance daily averages. */
  dailyCost: Decimal;
};

export type NetworkUsageDeps = {
  inventory: Pick<GcpInventory, "describeInstance">;
  executor: RemoteExecutor;
  projectId: string;
  zone: string;
  rates: RateTable;
  logger?: Logger;
  now?: () => number;
};

export function uptimeDays(instance: GcpComputeInstance, nowMs: number): number {
  const started = instance.lastStartedAt ? Date.parse(instance.lastStartedAt) : Number.NaN;
  if (Number.isNaN(started) || started > nowMs) return 0;
  return Math.floor((nowMs - started) / MS_PER_DAY);
}

async function probeInstance(
  instance: GcpComputeInstance,
  deps: NetworkUsageDeps,
  nowMs: number,
): Promise<InstanceNetworkUsage> {
  let stdout: string;
  try {
    stdout = await deps.executor.run(
      { instance: instance.name, zone: instance.zone || deps.zone, projectId: deps.projectId },
      NETWORK_PROBE_SCRIPT,
    );
  } catch (err) {
    throw new UnreachableError(instance.name, errorMessage(err), { cause: err });
  }

  const sample = parseProbeOutput(stdout);
  if (sample.rxBytes === undefined || sample.txBytes === undefined) {
    throw new UnreachableError(instance.name, "probe returned no byte counters");
  }

  const { networkFreeTierGb, networkEgressPerGb } = deps.rates;
  const usage: InstanceNetworkUsage = {
    instance: instance.name,
    interface: sample.interface,
    rxBytes: sample.rxBytes,
    txBytes: sample.txBytes,
    rxRate: sample.rxRate,
    txRate: sample.txRate,
    egressCost: priceEgress(sample.txBytes, networkFreeTierGb, networkEgressPerGb),
    uptimeDays: uptimeDays(instance, nowMs),
  };

  if (usage.uptimeDays > 0) {
    usage.dailyAverageGb = bytesToGbExact(sample.txBytes).div(usage.uptimeDays);
    usage.dailyCost = priceEgressGb(usage.dailyAverageGb, networkFreeTierGb, networkEgressPerGb);
  }
  return usage;
}

/**
 * Probe every named instance. Missing, stopped and unreachable instances
 * are skipped; the run never aborts on one of them.
 */
export async function collectNetworkUsage(
  names: readonly string[],
  deps: NetworkUsageDeps,
): Promise<NetworkUsageReport> {
  const now = deps.now ?? Date.now;
  const instances: InstanceNetworkUsage[] = [];
  const skipped: SkippedResource[] = [];

  for (const name of names) {
    const log = deps.logger?.withContext({ instance: name });
    let instance: GcpComputeInstance;
    try {
      instance = await deps.inventory.describeInstance(name);
    } catch (err) {
      if (!(err instanceof NotFoundError || err instanceof UnreachableError)) throw err;
      const entry = skippedFrom(err);
      skipped.push(entry);
      log?.warn(entry.detail);
      continue;
    }

    if (instance.status !== RUNNING) {
      skipped.push({ resource: name, reason: "not_running", detail: `${name} is ${instance.status} (not running)` });
      continue;
    }

    try {
      instances.push(await probeInstance(instance, deps, now()));
    } catch (err) {
      if (!(err instanceof UnreachableError)) throw err;
      log?.warn(err.message);
      skipped.push(skippedFrom(err));
    }
  }

  const totalRxBytes = instances.reduce((acc, usage) => acc + usage.rxBytes, 0);
  const totalTxBytes = instances.reduce((acc, usage) => acc + usage.txBytes, 0);
  const { networkFreeTierGb, networkEgressPerGb } = deps.rates;

  return {
    instances,
    skipped,
    totalRxBytes,
    totalTxBytes,
    totalEgressGb: bytesToGbExact(totalTxBytes),
    totalEgressCost: priceEgress(totalTxBytes, networkFreeTierGb, networkEgressPerGb),
    dailyCost: sum(instances.map((usage) => usage.dailyCost).filter((cost): cost is Decimal => cost !== undefined)),
  };
}

// =============================================================================
// Rendering
// =============================================================================

export type NetworkRenderOptions = {
  projectId: string;
  /** Egress alert line is printed above this many GB. */
  thresholdGb?: Decimal;
  now: Date;
};

/** Egress over the configured threshold, if one is set. */
export function egressOverThreshold(report: NetworkUsageReport, thresholdGb: Decimal | undefined): boolean {
  return thresholdGb !== undefined && report.totalEgressGb.gt(thresholdGb);
}

function usageLines(usage: InstanceNetworkUsage): string[] {
  const out = [
    `Primary Interface: ${usage.interface ?? "unknown"}`,
    `  RX (Received): ${formatBytes(usage.rxBytes)}`,
    `  TX (Sent):     ${formatBytes(usage.txBytes)}`,
  ];
  if (usage.rxRate !== undefined && usage.txRate !== undefined) {
    out.push(
      "Current bandwidth:",
      `  Download: ${Math.floor(usage.rxRate / 1024)} KB/s`,
      `  Upload: ${Math.floor(usage.txRate / 1024)} KB/s`,
    );
  }
  out.push(
    "",
    "EGRESS COST ESTIMATE:",
    "-----------------------",
    `Total egress: ${formatBytes(usage.txBytes)} (${bytesToGb(usage.txBytes)} GB)`,
    `Estimated total cost: ${formatUsd(usage.egressCost)}`,
  );
  if (usage.dailyAverageGb && usage.dailyCost) {
    out.push(`Daily average: ${usage.dailyAverageGb.toFixed(2)} GB (${formatUsd(usage.dailyCost)}/day)`);
  }
  return out;
}

export function renderNetworkUsage(report: NetworkUsageReport, options: NetworkRenderOptions): string {
  const rule = "===================================";
  const out: string[] = [rule, "GCP Network Usage Monitor", rule, `Date: ${formatLocalTimestamp(options.now)}`, ""];

  for (const usage of report.instances) {
    out.push(`INSTANCE: ${usage.instance}`, "-----------------------------------");
    out.push(...usageLines(usage), "", rule, "");
  }
  for (const skipped of report.skipped) {
    out.push(`INSTANCE: ${skipped.resource}`, "-----------------------------------", `Skipped: ${skipped.detail}`, "");
  }

  if (report.instances.length + report.skipped.length > 1) {
    out.push(
      "TOTAL NETWORK SUMMARY:",
      "--------------------",
      `Total RX (all instances): ${formatBytes(report.totalRxBytes)}`,
      `Total TX (all instances): ${formatBytes(report.totalTxBytes)}`,
      `Total egress cost: ${formatUsd(report.totalEgressCost)}`,
      "",
    );
  }

  if (options.thresholdGb && egressOverThreshold(report, options.thresholdGb)) {
    out.push(
      `⚠️  ALERT: Network egress (${bytesToGb(report.totalTxBytes)} GB) exceeds threshold (${options.thresholdGb.toString()} GB)`,
      "",
    );
  }

  out.push(
    "OPTIMIZATION TIPS:",
    "-----------------",
    "1. Enable compression (gzip) in your applications",
    "2. Use Cloud CDN for static content",
    "3. Keep traffic within the same region when possible",
    "4. Batch API calls to reduce overhead",
    "5. Monitor and optimize large data transfers",
    "",
    "For detailed network metrics:",
    `https://console.cloud.google.com/networking/networks/list?project=${options.projectId}`,
  );
  return out.join("\n");
}
