/**
 * Slack-compatible incoming webhook notifier.
 *
 * A message counts as delivered only when the webhook answers with the
 * body `ok`.
 */

import type Decimal from "decimal.js-light";

import { formatLocalTimestamp, type Logger } from "../../../src/logging/logger.js";
import { localDateStamp } from "../../../src/config/paths.js";
import { DeliveryFailureError, errorMessage } from "./errors.js";
import { formatUsd } from "./money.js";
import type { AlertPayload } from "./types.js";

export const COLOR_OK = "#36a64f";
export const COLOR_WARNING = "#ff9500";
export const COLOR_ALERT = "#ff0000";

const FOOTER = "GCP Cost Monitor";
const FOOTER_ICON =
  "https://www.gstatic.com/devrel-devsite/prod/v1241c04ebcb2127897d6c18221acbd64e7ed5c46e5217fd83dd808e592c47bf6/cloud/images/favicons/onecloud/super_cloud.png";

// =============================================================================
// Payload types
// =============================================================================

export type SlackText = { type: "plain_text" | "mrkdwn"; text: string; emoji?: boolean };

export type SlackBlock =
  | { type: "header"; text: SlackText }
  | { type: "divider" }
  | { type: "context"; elements: SlackText[] }
  | {
      type: "section";
      text?: SlackText;
      fields?: SlackText[];
      accessory?: { type: "button"; text: SlackText; url: string; action_id: string };
    };

export type SlackAttachment = {
  color: string;
  title?: string;
  text?: string;
  footer?: string;
  footer_icon?: string;
  ts?: number;
  fields?: Array<{ title: string; value: string; short: boolean }>;
};

export type SlackPayload = {
  username: string;
  icon_emoji: string;
  channel: string;
  blocks?: SlackBlock[];
  attachments?: SlackAttachment[];
};

/** Outcome of one webhook POST. */
export type DeliveryResult = { success: boolean; error?: string };

export type ReportStatus = "ok" | "warning" | "alert";

const STATUS_STYLE: Record<ReportStatus, { color: string; emoji: string; label: string }> = {
  ok: { color: COLOR_OK, emoji: "✅", label: "Ok" },
  warning: { color: COLOR_WARNING, emoji: "⚠️", label: "Warning" },
  alert: { color: COLOR_ALERT, emoji: "🚨", label: "Alert" },
};

export function billingUrl(projectId: string): string {
  return `https://console.cloud.google.com/billing/projects/${projectId}`;
}

const mrkdwn = (text: string): SlackText => ({ type: "mrkdwn", text });
const plain = (text: string): SlackText => ({ type: "plain_text", text, emoji: true });

// =============================================================================
// Notifier
// =============================================================================

export type SlackNotifierOptions = {
  webhookUrl: string;
  projectId: string;
  channel: string;
  username: string;
  icon: string;
  /** Daily threshold shown on cost reports. */
  dailyThreshold: Decimal;
  /** Prepended to alert messages. */
  mentions?: string;
  timeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
};

export type MessageOptions = {
  color?: string;
  title?: string;
  icon?: string;
  username?: string;
};

export class SlackNotifier {
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(private readonly options: SlackNotifierOptions) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.now = options.now ?? (() => new Date());
  }

  /** POST a payload. Network errors and timeouts are failures, never throws. */
  async post(payload: SlackPayload): Promise<DeliveryResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(this.options.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      const body = (await res.text()).trim();
      if (body === "ok") return { success: true };
      const error = `Webhook did not acknowledge: ${body || `HTTP ${res.status}`}`;
      this.options.logger?.error(error);
      return { success: false, error };
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
      const error = `Webhook request failed: ${reason}`;
      this.options.logger?.error(error);
      return { success: false, error };
    } finally {
      clearTimeout(timer);
    }
  }

  envelope(overrides: Pick<MessageOptions, "icon" | "username"> = {}): SlackPayload {
    return {
      username: overrides.username ?? this.options.username,
      icon_emoji: overrides.icon ?? this.options.icon,
      channel: this.options.channel,
    };
  }

  buildMessage(text: string, opts: MessageOptions = {}): SlackPayload {
    return {
      ...this.envelope(opts),
      attachments: [
        {
          color: opts.color ?? COLOR_OK,
          title: opts.title ?? FOOTER,
          text,
          footer: FOOTER,
          footer_icon: FOOTER_ICON,
          ts: Math.floor(this.now().getTime() / 1000),
        },
      ],
    };
  }

  sendMessage(text: string, opts?: MessageOptions): Promise<DeliveryResult> {
    return this.post(this.buildMessage(text, opts));
  }

  /** `breakdown` is a bullet list, one category per line. */
  buildCostReport(dailyCost: Decimal, breakdown: string, status: ReportStatus): SlackPayload {
    const style = STATUS_STYLE[status];
    const { projectId } = this.options;
    return {
      ...this.envelope(),
      blocks: [
        { type: "header", text: plain(`💰 GCP Daily Cost Report - ${projectId}`) },
        { type: "divider" },
        {
          type: "section",
          fields: [mrkdwn(`*Date:*\n${localDateStamp(this.now())}`), mrkdwn(`*Total Cost:*\n${formatUsd(dailyCost)}`)],
        },
        { type: "section", text: mrkdwn(`*📊 Breakdown:*\n${breakdown}`) },
        { type: "divider" },
        {
          type: "context",
          elements: [mrkdwn(`View detailed billing: <${billingUrl(projectId)}|GCP Console>`)],
        },
      ],
      attachments: [
        {
          color: style.color,
          fields: [
            { title: "Status", value: `${style.emoji} ${style.label}`, short: true },
            { title: "Threshold", value: formatUsd(this.options.dailyThreshold), short: true },
          ],
        },
      ],
    };
  }

  sendCostReport(dailyCost: Decimal, breakdown: string, status: ReportStatus): Promise<DeliveryResult> {
    return this.post(this.buildCostReport(dailyCost, breakdown, status));
  }

  buildAlertText(alertType: string, alert: AlertPayload): string {
    const lines = [
      this.options.mentions ?? "",
      "",
      `🚨 *GCP COST ALERT* - ${this.options.projectId}`,
      "━━━━━━━━━━━━━━━━━━━━━━━━━━━━━",
      "",
      `*Alert Type:* ${alertType}`,
      `*Message:* ${alert.message}`,
      `*Current Value:* ${alert.currentValue}`,
      `*Threshold:* ${alert.thresholdValue}`,
      "",
      `*Time:* ${formatLocalTimestamp(new Date(alert.timestamp * 1000))}`,
    ];
    return lines.join("\n");
  }

  sendAlert(alertType: string, alert: AlertPayload): Promise<DeliveryResult> {
    return this.sendMessage(this.buildAlertText(alertType, alert), {
      color: COLOR_ALERT,
      title: "⚠️ Cost Alert - Immediate Action Required",
      icon: ":rotating_light:",
    });
  }
}

/** Turn an unacknowledged delivery into a DeliveryFailureError. */
export function ensureDelivered(result: DeliveryResult, what: string): void {
  if (!result.success) {
    throw new DeliveryFailureError(`Failed to deliver ${what}: ${result.error ?? "unknown error"}`, result.error);
  }
}
