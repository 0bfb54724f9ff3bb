/**
 * Cost Estimator: daily cost of an inventory snapshot.
 *
 * Pure; all arithmetic is decimal. Compute is rounded to cents per
 * instance, other items keep full precision until the category total is
 * rounded. `total` is the sum of the rounded categories.
 */

import type Decimal from "decimal.js-light";

import { ZERO, monthlyToDaily, roundCents, sum } from "./money.js";
import { machineTypeMonthly, type RateTable } from "./rates.js";
import type {
  ComputeInstanceRecord,
  CostCategory,
  CostEstimate,
  DiskRecord,
  LineItem,
  ResourceRecord,
  StaticIpRecord,
} from "./types.js";

export const RUNNING = "RUNNING";
export const RESERVED = "RESERVED";
export const TERMINATED = "TERMINATED";

type ItemCost = { daily: Decimal; warning?: string; note?: string };

// =============================================================================
// Per-resource costs
// =============================================================================

export function dailyComputeCost(record: ComputeInstanceRecord, rates: RateTable): ItemCost {
  const monthly = machineTypeMonthly(rates, record.machineType);
  if (monthly === undefined) {
    return {
      daily: ZERO,
      warning: `${record.name}: unknown machine type ${record.machineType ?? "(none)"}, priced at $0.00`,
      note: "unknown machine type",
    };
  }
  if (record.status !== RUNNING) return { daily: ZERO, note: "not running" };
  return { daily: roundCents(monthlyToDaily(monthly)) };
}

/** Reserved addresses bill whether or not anything is attached. */
export function dailyStaticIpCost(record: StaticIpRecord, rates: RateTable): ItemCost {
  const daily = monthlyToDaily(rates.staticIpMonthly);
  return record.status === RESERVED ? { daily, note: "not in use" } : { daily };
}

export function dailyDiskCost(record: DiskRecord, rates: RateTable): ItemCost {
  if (record.sizeGb === undefined) {
    return { daily: ZERO, warning: `${record.name}: disk size unknown, priced at $0.00`, note: "size unknown" };
  }
  const perGb = rates.diskGbMonthly[record.diskType ?? "standard"];
  return { daily: monthlyToDaily(perGb.mul(record.sizeGb)) };
}

function costOf(record: ResourceRecord, rates: RateTable): ItemCost & { category: CostCategory } {
  switch (record.kind) {
    case "compute_instance":
      return { category: "compute", ...dailyComputeCost(record, rates) };
    case "static_ip":
      return { category: "static_ip", ...dailyStaticIpCost(record, rates) };
    case "disk":
      return { category: "storage", ...dailyDiskCost(record, rates) };
  }
}

// =============================================================================
// estimateDailyCost
// =============================================================================

export function estimateDailyCost(records: readonly ResourceRecord[], rates: RateTable): CostEstimate {
  const items: LineItem[] = [];
  const warnings: string[] = [];

  for (const record of records) {
    const { category, daily, warning, note } = costOf(record, rates);
    items.push({ category, resource: record.name, daily, note });
    if (warning) warnings.push(warning);
  }

  const categoryTotal = (category: CostCategory): Decimal =>
    roundCents(sum(items.filter((item) => item.category === category).map((item) => item.daily)));

  const breakdown: Record<CostCategory, Decimal> = {
    compute: categoryTotal("compute"),
    static_ip: categoryTotal("static_ip"),
    storage: categoryTotal("storage"),
  };

  return {
    total: sum(Object.values(breakdown)),
    breakdown,
    items,
    warnings,
  };
}

// =============================================================================
// Optimisation findings
// =============================================================================

export type OptimisationFindings = {
  unusedStaticIps: string[];
  /** Daily cost of the unused addresses, rounded to cents. */
  unusedStaticIpDaily: Decimal;
  stoppedInstances: string[];
};

export function findOptimisations(
  addresses: readonly StaticIpRecord[],
  stoppedInstances: readonly string[],
  rates: RateTable,
): OptimisationFindings {
  const unused = addresses.filter((a) => a.status === RESERVED).map((a) => a.name);
  return {
    unusedStaticIps: unused,
    unusedStaticIpDaily: roundCents(monthlyToDaily(rates.staticIpMonthly).mul(unused.length)),
    stoppedInstances: [...stoppedInstances],
  };
}
