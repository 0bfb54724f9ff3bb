/**
 * Webhook delivery for pipeline alerts.
 */

import type Decimal from "decimal.js-light";

import { ALERT_TITLES, type AlertDispatcher } from "./pipeline.js";
import type { DeliveryResult, SlackNotifier } from "./slack.js";
import type { AlertPayload } from "./types.js";

export type RunSummary = {
  total: Decimal;
  /** Bullet list of the category lines, one per line. */
  breakdown: string;
};

/**
 * - `daily_ok_status` posts the cost report with status ok.
 * - `cost_threshold` posts the alert followed by the cost report with
 *   status alert; both must be acknowledged.
 * - Everything else posts the alert alone.
 */
export class WebhookAlertDispatcher implements AlertDispatcher {
  constructor(
    private readonly notifier: Pick<SlackNotifier, "sendAlert" | "sendCostReport">,
    private readonly summary: RunSummary,
  ) {}

  async dispatch(alert: AlertPayload): Promise<DeliveryResult> {
    const { total, breakdown } = this.summary;
    if (alert.category === "daily_ok_status") {
      return this.notifier.sendCostReport(total, breakdown, "ok");
    }

    const sent = await this.notifier.sendAlert(ALERT_TITLES[alert.category], alert);
    if (!sent.success || alert.category !== "cost_threshold") return sent;
    return this.notifier.sendCostReport(total, breakdown, "alert");
  }
}

/** `• Compute: $0.20` lines for the cost report. */
export function bulletList(lines: readonly string[]): string {
  return lines.map((line) => `• ${line}`).join("\n");
}
