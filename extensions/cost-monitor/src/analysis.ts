/**
 * Daily cost analysis: inventory snapshot, estimate and optimisation
 * findings, rendered as the operator-facing text report.
 */

import { formatLocalTimestamp } from "../../../src/logging/logger.js";
import {
  dailyComputeCost,
  dailyDiskCost,
  dailyStaticIpCost,
  estimateDailyCost,
  findOptimisations,
  RESERVED,
  RUNNING,
  type OptimisationFindings,
} from "./estimator.js";
import { instanceRecord, snapshotInventory, type GcpInventory, type InventorySnapshot } from "./inventory.js";
import { formatUsd } from "./money.js";
import type { RateTable } from "./rates.js";
import { CATEGORY_LABELS, type CostEstimate, type DiskRecord } from "./types.js";

export type MonitorFlags = { compute: boolean; staticIp: boolean; storage: boolean; network: boolean };

export type CostAnalysis = {
  projectId: string;
  generatedAt: Date;
  monitor: MonitorFlags;
  rates: RateTable;
  snapshot: InventorySnapshot;
  estimate: CostEstimate;
  findings: OptimisationFindings;
};

export type AnalysisInput = {
  projectId: string;
  instances: readonly string[];
  monitor: MonitorFlags;
  rates: RateTable;
  now?: () => Date;
};

export async function runCostAnalysis(inventory: GcpInventory, input: AnalysisInput): Promise<CostAnalysis> {
  const snapshot = await snapshotInventory(inventory, { instances: input.instances, monitor: input.monitor });
  return {
    projectId: input.projectId,
    generatedAt: (input.now ?? (() => new Date()))(),
    monitor: input.monitor,
    rates: input.rates,
    snapshot,
    estimate: estimateDailyCost(snapshot.records, input.rates),
    findings: findOptimisations(snapshot.staticIps, snapshot.stoppedInstances, input.rates),
  };
}

/** Network is estimated from billing, never from the inventory. */
export const NETWORK_SUMMARY_LINE = "Network: ~$0.00 (see billing)";

/** Summary lines for the enabled categories, e.g. `Compute: $0.41`. */
export function breakdownLines(analysis: Pick<CostAnalysis, "estimate" | "monitor">): string[] {
  const { breakdown } = analysis.estimate;
  const lines: string[] = [];
  if (analysis.monitor.compute) lines.push(`${CATEGORY_LABELS.compute}: ${formatUsd(breakdown.compute)}`);
  if (analysis.monitor.staticIp) lines.push(`${CATEGORY_LABELS.static_ip}: ${formatUsd(breakdown.static_ip)}`);
  if (analysis.monitor.storage) lines.push(`${CATEGORY_LABELS.storage}: ${formatUsd(breakdown.storage)}`);
  if (analysis.monitor.network) lines.push(NETWORK_SUMMARY_LINE);
  return lines;
}

function heading(title: string, underline: string): string[] {
  return [title, "-".repeat(underline.length)];
}

function longDate(date: Date): string {
  return date.toLocaleDateString("en-US", { month: "long", day: "2-digit", year: "numeric" });
}

export function renderCostAnalysis(analysis: CostAnalysis): string {
  const { snapshot, rates, monitor, estimate, findings, projectId } = analysis;
  const rule = "=".repeat(39);
  const out: string[] = [rule, `GCP Daily Cost Analysis - ${longDate(analysis.generatedAt)}`, rule, ""];

  if (monitor.compute) {
    out.push(...heading("1. COMPUTE ENGINE INSTANCES:", "----------------------------"));
    for (const instance of snapshot.instances) {
      const cost = dailyComputeCost(instanceRecord(instance), rates);
      out.push(`Instance: ${instance.name}`, `  Status: ${instance.status}`, `  Type: ${instance.machineType}`);
      out.push(`  Created: ${instance.createdAt.slice(0, 10)}`);
      if (cost.warning) out.push("  Cost: Unknown machine type");
      out.push(
        instance.status === RUNNING
          ? `  Daily Cost: ${formatUsd(cost.daily)}`
          : `  Daily Cost: ${formatUsd(cost.daily)} (not running)`,
        "",
      );
    }
  }

  if (monitor.staticIp) {
    out.push(...heading("2. STATIC IP ADDRESSES:", "----------------------"));
    if (snapshot.staticIps.length === 0) out.push("No static IPs found", "");
    for (const ip of snapshot.staticIps) {
      const { daily } = dailyStaticIpCost(ip, rates);
      out.push(`IP: ${ip.name} (${ip.address ?? "-"})`, `  Status: ${ip.status}`, `  Region: ${ip.region ?? "-"}`);
      out.push(
        ip.status === RESERVED
          ? `  Daily Cost: ${formatUsd(daily)} (WARNING: Not in use!)`
          : `  Daily Cost: ${formatUsd(daily)}`,
        "",
      );
    }
  }

  if (monitor.storage) {
    out.push(...heading("3. PERSISTENT DISKS:", "-------------------"));
    const disks = snapshot.records.filter((r): r is DiskRecord => r.kind === "disk");
    if (disks.length === 0) out.push("No persistent disks found", "");
    for (const disk of disks) {
      const { daily } = dailyDiskCost(disk, rates);
      out.push(`Disk: ${disk.name}`, `  Size: ${disk.sizeGb === undefined ? "unknown" : `${disk.sizeGb}GB`}`);
      out.push(`  Type: ${disk.typeName ?? disk.diskType ?? "-"}`, `  Zone: ${disk.zone ?? "-"}`);
      out.push(`  Daily Cost: ${formatUsd(daily)}`, "");
    }
  }

  if (monitor.network) {
    out.push(...heading("4. NETWORK USAGE ESTIMATE:", "-------------------------"));
    out.push("Note: This is an estimate. Check billing for exact network costs.");
    out.push(
      `Network egress: ${formatUsd(rates.networkEgressPerGb)}/GB after ${rates.networkFreeTierGb.toString()}GB free`,
      "",
    );
  }

  out.push(...heading("5. DAILY COST SUMMARY:", "---------------------"));
  out.push(...breakdownLines(analysis), "");
  out.push(`TOTAL ESTIMATED DAILY COST: ${formatUsd(estimate.total)}`, "");

  if (estimate.warnings.length > 0 || snapshot.skipped.length > 0) {
    out.push(...heading("WARNINGS:", "---------"));
    for (const warning of estimate.warnings) out.push(`- ${warning}`);
    for (const skipped of snapshot.skipped) out.push(`- Skipped ${skipped.detail}`);
    out.push("");
  }

  out.push(...heading("6. OPTIMIZATION OPPORTUNITIES:", "-----------------------------"));
  if (findings.unusedStaticIps.length > 0) {
    out.push(
      `⚠️  Found ${findings.unusedStaticIps.length} unused static IP(s) - Release to save ${formatUsd(findings.unusedStaticIpDaily)}/day`,
    );
  }
  if (findings.stoppedInstances.length > 0) {
    out.push(`💡 ${findings.stoppedInstances.length} instance(s) are stopped but still incur disk costs`);
  }
  out.push(
    "",
    "✓ Enable instance auto-shutdown for dev/test environments",
    "✓ Use preemptible instances for batch workloads",
    "✓ Implement lifecycle policies for storage",
    "✓ Monitor and optimize network egress",
    "",
  );

  out.push(...heading("7. QUICK ACTIONS:", "----------------"));
  out.push(
    `📊 Detailed billing: https://console.cloud.google.com/billing/projects/${projectId}`,
    `🖥️  Instance metrics: https://console.cloud.google.com/compute/instances?project=${projectId}`,
    `💾 Disk management: https://console.cloud.google.com/compute/disks?project=${projectId}`,
    `🌐 Network details: https://console.cloud.google.com/networking/addresses?project=${projectId}`,
  );

  return out.join("\n");
}

/** Short copy saved to `logs/cost-analysis-YYYY-MM-DD.log`. */
export function renderAnalysisLog(analysis: CostAnalysis): string {
  return [
    `Cost Analysis Report - ${formatLocalTimestamp(analysis.generatedAt)}`,
    "==============================",
    `Total Daily Cost: ${formatUsd(analysis.estimate.total)}`,
    "",
    "Breakdown:",
    ...breakdownLines(analysis),
    "",
  ].join("\n");
}
