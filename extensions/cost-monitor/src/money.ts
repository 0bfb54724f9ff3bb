/**
 * Decimal money helpers. Costs never pass through binary floating point.
 */

import Decimal, { type Numeric } from "decimal.js-light";

export type MoneyValue = Numeric;

export const ZERO = new Decimal(0);

/** Days per billing month used for every monthly → daily conversion. */
export const DAYS_PER_MONTH = 30;

export function toDecimal(value: MoneyValue): Decimal {
  return new Decimal(value);
}

/** Round half-up to cents. */
export function roundCents(value: MoneyValue): Decimal {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function sum(values: Iterable<MoneyValue>): Decimal {
  let total = ZERO;
  for (const value of values) total = total.add(value);
  return total;
}

export function monthlyToDaily(monthly: MoneyValue): Decimal {
  return new Decimal(monthly).div(DAYS_PER_MONTH);
}

/** `12.3` → `"$12.30"`; negative amounts keep their sign. */
export function formatUsd(amount: MoneyValue): string {
  const dec = roundCents(amount);
  return dec.isNegative() ? `-$${dec.abs().toFixed(2)}` : `$${dec.toFixed(2)}`;
}

/**
 * Percentage change from `previous` to `current`, rounded half-up to two
 * places. Undefined when there is no positive baseline.
 */
export function percentChange(current: MoneyValue, previous: MoneyValue): Decimal | undefined {
  const prev = new Decimal(previous);
  if (!prev.gt(0)) return undefined;
  return new Decimal(current).sub(prev).div(prev).mul(100).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}
