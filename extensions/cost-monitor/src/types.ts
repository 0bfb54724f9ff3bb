/**
 * Cost monitor domain types.
 */

import type Decimal from "decimal.js-light";

// =============================================================================
// Inventory
// =============================================================================

export type DiskClass = "standard" | "ssd";

export type ComputeInstanceRecord = {
  kind: "compute_instance";
  name: string;
  /** Provider status enum (`RUNNING`, `TERMINATED`, ...). */
  status: string;
  machineType?: string;
  zone?: string;
};

export type StaticIpRecord = {
  kind: "static_ip";
  name: string;
  /** `RESERVED` means held but not attached to anything. */
  status: string;
  address?: string;
  region?: string;
};

export type DiskRecord = {
  kind: "disk";
  name: string;
  status: string;
  sizeGb?: number;
  diskType?: DiskClass;
  /** Provider type name, e.g. `pd-balanced`. */
  typeName?: string;
  zone?: string;
};

export type ResourceRecord = ComputeInstanceRecord | StaticIpRecord | DiskRecord;
export type ResourceKind = ResourceRecord["kind"];

/** A resource left out of a run, with the reason it was skipped. */
export type SkippedResource = {
  resource: string;
  reason: "not_found" | "unreachable" | "not_running";
  detail: string;
};

// =============================================================================
// Estimates
// =============================================================================

export type CostCategory = "compute" | "static_ip" | "storage";

export const COST_CATEGORIES: readonly CostCategory[] = ["compute", "static_ip", "storage"];

export const CATEGORY_LABELS: Record<CostCategory, string> = {
  compute: "Compute",
  static_ip: "Static IPs",
  storage: "Storage",
};

export type LineItem = {
  category: CostCategory;
  resource: string;
  daily: Decimal;
  note?: string;
};

export type CostEstimate = {
  total: Decimal;
  breakdown: Record<CostCategory, Decimal>;
  items: LineItem[];
  warnings: string[];
};

// =============================================================================
// Alerts
// =============================================================================

export const ALERT_CATEGORIES = [
  "cost_increase",
  "network_threshold",
  "cost_threshold",
  "unused_resources",
  "daily_ok_status",
] as const;

export type AlertCategory = (typeof ALERT_CATEGORIES)[number];

export function isAlertCategory(value: string): value is AlertCategory {
  return ALERT_CATEGORIES.some((category) => category === value);
}

/** Category → epoch seconds of its last firing. */
export type AlertLedger = Map<AlertCategory, number>;

export type AlertPayload = {
  category: AlertCategory;
  message: string;
  currentValue: string;
  thresholdValue: string;
  /** Epoch seconds. */
  timestamp: number;
};
