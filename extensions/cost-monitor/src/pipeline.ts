/**
 * Alert Decision Pipeline: turn a run's metrics into alert candidates,
 * rate-limit them through the cooldown ledger and hand the survivors to a
 * dispatcher.
 */

import type Decimal from "decimal.js-light";

import type { Logger } from "../../../src/logging/logger.js";
import { bytesToGb, bytesToGbExact } from "./egress.js";
import { errorMessage } from "./errors.js";
import { shouldFire } from "./ledger.js";
import type { AlertLedgerStore } from "./ledger-store.js";
import { formatUsd, percentChange } from "./money.js";
import type { AlertCategory, AlertPayload } from "./types.js";

export const ALERT_TITLES: Record<AlertCategory, string> = {
  cost_increase: "Cost Increase",
  network_threshold: "Network Threshold",
  cost_threshold: "Daily Cost Threshold",
  unused_resources: "Unused Resources",
  daily_ok_status: "Daily Status",
};

// =============================================================================
// Candidates
// =============================================================================

export type RunMetrics = {
  total: Decimal;
  /** Total recorded by the previous run, if any. */
  previousTotal?: Decimal;
  /** Measured egress; absent when network usage was not collected. */
  egressBytes?: number;
  unusedStaticIps: number;
  unusedStaticIpDaily: Decimal;
};

export type AlertThresholds = {
  dailyCost: Decimal;
  costIncreasePercent: Decimal;
  networkGb?: Decimal;
};

export type CandidateOptions = {
  monitorNetwork: boolean;
  sendOkStatus: boolean;
};

export type AlertCandidate = {
  category: AlertCategory;
  triggered: boolean;
  message: string;
  currentValue: string;
  thresholdValue: string;
};

export function thresholdExceeded(metrics: Pick<RunMetrics, "total">, thresholds: AlertThresholds): boolean {
  return metrics.total.gt(thresholds.dailyCost);
}

/** One candidate per category, in evaluation order. */
export function buildAlertCandidates(
  metrics: RunMetrics,
  thresholds: AlertThresholds,
  options: CandidateOptions,
): AlertCandidate[] {
  const total = formatUsd(metrics.total);
  const exceeded = thresholdExceeded(metrics, thresholds);

  const change = metrics.previousTotal ? percentChange(metrics.total, metrics.previousTotal) : undefined;
  const previous = metrics.previousTotal ? formatUsd(metrics.previousTotal) : "$0.00";

  const egressGb = metrics.egressBytes === undefined ? undefined : bytesToGbExact(metrics.egressBytes);
  const networkLimit = thresholds.networkGb;

  return [
    {
      category: "cost_increase",
      triggered: change !== undefined && change.gt(thresholds.costIncreasePercent),
      message: `Daily costs increased by ${change?.toFixed(2) ?? "0.00"}% since last check`,
      currentValue: total,
      thresholdValue: `${previous} (previous)`,
    },
    {
      category: "network_threshold",
      triggered:
        options.monitorNetwork && networkLimit !== undefined && egressGb !== undefined && egressGb.gt(networkLimit),
      message: "Network egress exceeded configured threshold",
      currentValue: `${metrics.egressBytes === undefined ? "0.000" : bytesToGb(metrics.egressBytes)}GB`,
      thresholdValue: `${networkLimit?.toString() ?? "-"}GB`,
    },
    {
      category: "cost_threshold",
      triggered: exceeded,
      message: "Daily costs have exceeded your configured threshold",
      currentValue: total,
      thresholdValue: formatUsd(thresholds.dailyCost),
    },
    {
      category: "unused_resources",
      triggered: metrics.unusedStaticIps > 0,
      message: `Found ${metrics.unusedStaticIps} unused static IP(s) costing ${formatUsd(metrics.unusedStaticIpDaily)}/day`,
      currentValue: `${metrics.unusedStaticIps} IPs`,
      thresholdValue: "0 unused IPs",
    },
    {
      category: "daily_ok_status",
      triggered: options.sendOkStatus && !exceeded,
      message: "Daily costs are within the configured threshold",
      currentValue: total,
      thresholdValue: formatUsd(thresholds.dailyCost),
    },
  ];
}

// =============================================================================
// Evaluation
// =============================================================================

/** Delivers one alert; `success: false` means the webhook did not acknowledge. */
export interface AlertDispatcher {
  dispatch(alert: AlertPayload): Promise<{ success: boolean; error?: string }>;
}

export type AlertOutcome =
  | { category: AlertCategory; status: "not_triggered" | "suppressed" }
  | { category: AlertCategory; status: "delivered"; alert: AlertPayload }
  | { category: AlertCategory; status: "delivery_failed"; alert: AlertPayload; error: string }
  | { category: AlertCategory; status: "ledger_failed"; error: string };

export type EvaluateDeps = {
  store: AlertLedgerStore;
  dispatcher: AlertDispatcher;
  cooldownFor: (category: AlertCategory) => number;
  /** Epoch seconds. */
  now?: () => number;
  logger?: Logger;
};

/**
 * Evaluate candidates in order. The ledger check and the firing record
 * happen under the store lock; delivery happens after it is released, and
 * a failed delivery keeps its ledger entry. A category whose ledger step
 * fails is not sent and does not stop the others.
 */
export async function evaluateAlerts(
  candidates: readonly AlertCandidate[],
  deps: EvaluateDeps,
): Promise<AlertOutcome[]> {
  const now = deps.now ?? (() => Math.floor(Date.now() / 1000));
  const outcomes: AlertOutcome[] = [];

  for (const candidate of candidates) {
    const { category } = candidate;
    if (!candidate.triggered) {
      outcomes.push({ category, status: "not_triggered" });
      continue;
    }

    const log = deps.logger?.withContext({ category });
    const timestamp = now();
    let fire: boolean;
    try {
      fire = await deps.store.withLock(async () => {
        const ledger = await deps.store.load();
        if (!shouldFire(category, timestamp, ledger, deps.cooldownFor(category))) return false;
        await deps.store.put(category, timestamp);
        return true;
      });
    } catch (err) {
      // An alert whose firing cannot be recorded is not sent
      const error = errorMessage(err);
      log?.error(`Could not update alert ledger for ${ALERT_TITLES[category]} alert: ${error}`);
      outcomes.push({ category, status: "ledger_failed", error });
      continue;
    }

    if (!fire) {
      log?.info(`${ALERT_TITLES[category]} alert already sent recently, skipping`);
      outcomes.push({ category, status: "suppressed" });
      continue;
    }

    const alert: AlertPayload = {
      category,
      message: candidate.message,
      currentValue: candidate.currentValue,
      thresholdValue: candidate.thresholdValue,
      timestamp,
    };

    let result: { success: boolean; error?: string };
    try {
      result = await deps.dispatcher.dispatch(alert);
    } catch (err) {
      result = { success: false, error: errorMessage(err) };
    }

    if (result.success) {
      log?.info(`Sent ${ALERT_TITLES[category]} alert`);
      outcomes.push({ category, status: "delivered", alert });
    } else {
      const error = result.error ?? "unknown error";
      log?.error(`Failed to send ${ALERT_TITLES[category]} alert: ${error}`);
      outcomes.push({ category, status: "delivery_failed", alert, error });
    }
  }

  return outcomes;
}
