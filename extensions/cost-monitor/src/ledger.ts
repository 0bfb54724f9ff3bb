/**
 * Alert Cooldown Ledger: at most one "last fired" timestamp per category.
 *
 * Persisted form is one `category:epochSeconds` line per entry.
 */

import { CorruptStateError } from "./errors.js";
import { isAlertCategory, type AlertCategory, type AlertLedger } from "./types.js";

/** Four hours. */
export const DEFAULT_COOLDOWN_SECONDS = 14_400;

const LINE_PATTERN = /^([a-z_]+):(\d+)$/;

/**
 * True when the category has never fired, or strictly more than
 * `cooldownSeconds` have elapsed since it last did.
 */
export function shouldFire(
  category: AlertCategory,
  now: number,
  ledger: ReadonlyMap<AlertCategory, number>,
  cooldownSeconds: number = DEFAULT_COOLDOWN_SECONDS,
): boolean {
  const last = ledger.get(category);
  if (last === undefined) return true;
  return now - last > cooldownSeconds;
}

export function recordFired(category: AlertCategory, now: number, ledger: AlertLedger): AlertLedger {
  ledger.set(category, now);
  return ledger;
}

/**
 * Parse the persisted ledger. Duplicate categories collapse to the last
 * line; well-formed lines for categories this version does not know are
 * dropped.
 *
 * @throws CorruptStateError on the first malformed line.
 */
export function parseLedger(text: string): AlertLedger {
  const ledger: AlertLedger = new Map();
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (line === "") return;

    const match = LINE_PATTERN.exec(line);
    if (!match) {
      throw new CorruptStateError(`Malformed ledger line ${index + 1}: ${JSON.stringify(line)}`, index + 1);
    }
    const [, category, epoch] = match;
    const seconds = Number(epoch);
    if (!Number.isSafeInteger(seconds)) {
      throw new CorruptStateError(`Ledger timestamp out of range on line ${index + 1}`, index + 1);
    }
    if (isAlertCategory(category)) ledger.set(category, seconds);
  });

  return ledger;
}

export function serializeLedger(ledger: ReadonlyMap<AlertCategory, number>): string {
  let out = "";
  for (const [category, seconds] of ledger) out += `${category}:${seconds}\n`;
  return out;
}
