/**
 * Tiered Egress Pricing: free allowance, then a flat per-GB rate.
 *
 * Pricing uses GB = 2^30 bytes. Display formatting keeps the mixed
 * thresholds operators are used to (1024-based B/KB/MB, 2^30 for GB).
 */

import Decimal from "decimal.js-light";

import { InvalidArgumentError } from "./errors.js";
import { ZERO, type MoneyValue } from "./money.js";

export const BYTES_PER_KB = 1024;
export const BYTES_PER_MB = 1024 * 1024;
export const BYTES_PER_GB = 1073741824;

function assertByteCount(bytes: number): void {
  if (!Number.isSafeInteger(bytes) || bytes < 0) {
    throw new InvalidArgumentError(`bytesSent must be a non-negative integer, got ${bytes}`);
  }
}

export function bytesToGbExact(bytes: number): Decimal {
  assertByteCount(bytes);
  return new Decimal(bytes).div(BYTES_PER_GB);
}

/** Price an amount already expressed in GB (e.g. a daily average). */
export function priceEgressGb(gb: MoneyValue, freeTierGb: MoneyValue, ratePerGb: MoneyValue): Decimal {
  const amount = new Decimal(gb);
  if (amount.isNegative()) throw new InvalidArgumentError(`egress GB must be >= 0, got ${amount.toString()}`);
  if (amount.lte(freeTierGb)) return ZERO;
  return amount.sub(freeTierGb).mul(ratePerGb).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function priceEgress(bytesSent: number, freeTierGb: MoneyValue, ratePerGb: MoneyValue): Decimal {
  return priceEgressGb(bytesToGbExact(bytesSent), freeTierGb, ratePerGb);
}

// =============================================================================
// Display
// =============================================================================

/** GB truncated to `dp` places, for display (`1610612736` → `"1.500"`). */
export function bytesToGb(bytes: number, dp = 3): string {
  return bytesToGbExact(bytes).toFixed(dp, Decimal.ROUND_DOWN);
}

/** Human-readable size with two truncated decimals: `512B`, `1.50KB`, `3.25GB`. */
export function formatBytes(bytes: number): string {
  assertByteCount(bytes);
  const scaled = (divisor: number, unit: string): string =>
    `${new Decimal(bytes).div(divisor).toFixed(2, Decimal.ROUND_DOWN)}${unit}`;

  if (bytes < BYTES_PER_KB) return `${bytes}B`;
  if (bytes < BYTES_PER_MB) return scaled(BYTES_PER_KB, "KB");
  if (bytes < BYTES_PER_GB) return scaled(BYTES_PER_MB, "MB");
  return scaled(BYTES_PER_GB, "GB");
}
