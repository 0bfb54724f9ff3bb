/**
 * Rate table: monthly list prices used by every estimate.
 */

import Decimal from "decimal.js-light";

import { InvalidConfigurationError } from "./errors.js";
import type { MoneyValue } from "./money.js";
import type { DiskClass } from "./types.js";

export type RateTableInput = {
  machineTypes: Record<string, MoneyValue>;
  staticIpMonthly: MoneyValue;
  standardDiskGbMonthly: MoneyValue;
  ssdDiskGbMonthly: MoneyValue;
  networkFreeTierGb: MoneyValue;
  networkEgressPerGb: MoneyValue;
};

export type RateTable = Readonly<{
  machineTypes: ReadonlyMap<string, Decimal>;
  staticIpMonthly: Decimal;
  diskGbMonthly: Readonly<Record<DiskClass, Decimal>>;
  networkFreeTierGb: Decimal;
  networkEgressPerGb: Decimal;
}>;

function rate(name: string, value: MoneyValue, issues: string[]): Decimal {
  let dec: Decimal;
  try {
    dec = new Decimal(value);
  } catch {
    issues.push(`${name}: not a number (${String(value)})`);
    return new Decimal(0);
  }
  if (dec.isNegative()) issues.push(`${name}: must be >= 0 (got ${dec.toString()})`);
  return dec;
}

/**
 * Build the immutable rate table. Every rate must be a non-negative
 * decimal.
 *
 * @throws InvalidConfigurationError listing every offending rate.
 */
export function createRateTable(input: RateTableInput): RateTable {
  const issues: string[] = [];
  const machineTypes = new Map<string, Decimal>();
  for (const [type, monthly] of Object.entries(input.machineTypes)) {
    machineTypes.set(type, rate(`rates.machineTypes.${type}`, monthly, issues));
  }

  const table: RateTable = {
    machineTypes,
    staticIpMonthly: rate("rates.staticIpMonthly", input.staticIpMonthly, issues),
    diskGbMonthly: Object.freeze({
      standard: rate("rates.standardDiskGbMonthly", input.standardDiskGbMonthly, issues),
      ssd: rate("rates.ssdDiskGbMonthly", input.ssdDiskGbMonthly, issues),
    }),
    networkFreeTierGb: rate("rates.networkFreeTierGb", input.networkFreeTierGb, issues),
    networkEgressPerGb: rate("rates.networkEgressPerGb", input.networkEgressPerGb, issues),
  };

  if (issues.length > 0) {
    throw new InvalidConfigurationError("Invalid rate table", issues);
  }
  return Object.freeze(table);
}

/** Monthly price of a machine type, or undefined when it is not in the table. */
export function machineTypeMonthly(rates: RateTable, machineType: string | undefined): Decimal | undefined {
  return machineType === undefined ? undefined : rates.machineTypes.get(machineType);
}

/** Provider disk type names containing `ssd` bill at the SSD rate. */
export function classifyDiskType(type: string | undefined): DiskClass {
  return type !== undefined && type.toLowerCase().includes("ssd") ? "ssd" : "standard";
}
