/**
 * Daily webhook report: totals, day-over-day trend, issues and a monthly
 * projection.
 */

import type Decimal from "decimal.js-light";

import { formatLocalTimestamp } from "../../../src/logging/logger.js";
import { localDateStamp } from "../../../src/config/paths.js";
import type { CostAnalysis } from "./analysis.js";
import { formatBytes } from "./egress.js";
import { DAYS_PER_MONTH, formatUsd, percentChange, roundCents, ZERO } from "./money.js";
import { billingUrl, COLOR_OK, COLOR_WARNING, type SlackBlock, type SlackNotifier, type SlackPayload } from "./slack.js";
import type { CostCategory } from "./types.js";

/** Percent change beyond which the day counts as trending. */
export const TREND_BAND_PERCENT = 5;

export type Trend = "up" | "down" | "flat";

const TREND_EMOJI: Record<Trend, string> = { up: "📈", down: "📉", flat: "➡️" };

export type DailyReport = {
  projectId: string;
  date: Date;
  total: Decimal;
  breakdown: Record<CostCategory, Decimal>;
  /** Egress cost per day; zero when network usage was not measured. */
  networkCost: Decimal;
  /** Human-readable egress, e.g. `6.50GB`; undefined when not measured. */
  egress?: string;
  change?: Decimal;
  trend: Trend;
  issues: string[];
  status: "ok" | "warning";
  monthlyProjection: Decimal;
};

export function trendOf(change: Decimal | undefined): Trend {
  if (change === undefined) return "flat";
  if (change.gt(TREND_BAND_PERCENT)) return "up";
  if (change.lt(-TREND_BAND_PERCENT)) return "down";
  return "flat";
}

export type DailyReportInput = {
  analysis: CostAnalysis;
  dailyThreshold: Decimal;
  previousTotal?: Decimal;
  network?: { totalTxBytes: number; dailyCost: Decimal };
};

export function buildDailyReport(input: DailyReportInput): DailyReport {
  const { analysis, dailyThreshold, previousTotal, network } = input;
  const { total, breakdown } = analysis.estimate;
  const change = previousTotal ? percentChange(total, previousTotal) : undefined;

  const issues: string[] = [];
  let status: DailyReport["status"] = "ok";
  if (total.gt(dailyThreshold)) {
    issues.push(`⚠️ Daily cost exceeds threshold (${formatUsd(dailyThreshold)})`);
    status = "warning";
  }
  const { unusedStaticIps, unusedStaticIpDaily, stoppedInstances } = analysis.findings;
  if (unusedStaticIps.length > 0) {
    issues.push(`💡 ${unusedStaticIps.length} unused static IP(s) - ${formatUsd(unusedStaticIpDaily)}/day wasted`);
  }
  if (stoppedInstances.length > 0) {
    issues.push(`💾 ${stoppedInstances.length} stopped instance(s) still incurring disk costs`);
  }

  return {
    projectId: analysis.projectId,
    date: analysis.generatedAt,
    total,
    breakdown,
    networkCost: network ? roundCents(network.dailyCost) : ZERO,
    egress: network ? formatBytes(network.totalTxBytes) : undefined,
    change,
    trend: trendOf(change),
    issues,
    status,
    monthlyProjection: roundCents(total.mul(DAYS_PER_MONTH)),
  };
}

/** `📊 *Daily Cost:* $4.20 📈 (↑ 12.00%)` */
export function summaryLine(report: DailyReport): string {
  let line = `📊 *Daily Cost:* ${formatUsd(report.total)} ${TREND_EMOJI[report.trend]}`;
  if (report.change && !report.change.isZero()) {
    line += report.change.gt(0) ? ` (↑ ${report.change.toFixed(2)}%)` : ` (↓ ${report.change.abs().toFixed(2)}%)`;
  }
  return line;
}

function issuesText(report: DailyReport): string {
  return `*⚠️ Issues Found (${report.issues.length}):*\n${report.issues.map((issue) => `• ${issue}`).join("\n")}`;
}

export function buildDailyReportPayload(report: DailyReport, notifier: Pick<SlackNotifier, "envelope">): SlackPayload {
  const { projectId, breakdown } = report;
  const egress = report.egress ?? "not measured";
  const blocks: SlackBlock[] = [
    { type: "header", text: { type: "plain_text", text: "💰 GCP Daily Cost Report", emoji: true } },
    {
      type: "context",
      elements: [{ type: "mrkdwn", text: `*Project:* ${projectId} | *Date:* ${localDateStamp(report.date)}` }],
    },
    { type: "divider" },
    {
      type: "section",
      text: { type: "mrkdwn", text: summaryLine(report) },
      accessory: {
        type: "button",
        text: { type: "plain_text", text: "View Details", emoji: true },
        url: billingUrl(projectId),
        action_id: "view_details",
      },
    },
    {
      type: "section",
      fields: [
        { type: "mrkdwn", text: `*💻 Compute:*\n${formatUsd(breakdown.compute)}` },
        { type: "mrkdwn", text: `*💾 Storage:*\n${formatUsd(breakdown.storage)}` },
        { type: "mrkdwn", text: `*🌐 Static IPs:*\n${formatUsd(breakdown.static_ip)}` },
        { type: "mrkdwn", text: `*📡 Network:*\n~${formatUsd(report.networkCost)}` },
      ],
    },
    { type: "divider" },
    {
      type: "section",
      fields: [
        { type: "mrkdwn", text: `*🌐 Network Egress:*\n${egress}` },
        { type: "mrkdwn", text: `*📅 Monthly Projection:*\n${formatUsd(report.monthlyProjection)}` },
      ],
    },
  ];

  if (report.issues.length > 0) {
    blocks.push({ type: "divider" }, { type: "section", text: { type: "mrkdwn", text: issuesText(report) } });
  }

  return {
    ...notifier.envelope(),
    blocks,
    attachments: [
      {
        color: report.status === "ok" ? COLOR_OK : COLOR_WARNING,
        footer: `GCP Cost Monitor | <${billingUrl(projectId)}|View in Console>`,
        ts: Math.floor(report.date.getTime() / 1000),
      },
    ],
  };
}

/** Plain-text copy kept under `logs/reports/`. */
export function renderReportArchive(report: DailyReport): string {
  const { breakdown } = report;
  return [
    `Daily Report - ${formatLocalTimestamp(report.date)}`,
    "=======================",
    `Total Cost: ${formatUsd(report.total)}`,
    `Change: ${report.change?.toFixed(2) ?? "0.00"}%`,
    "",
    "Breakdown:",
    `- Compute: ${formatUsd(breakdown.compute)}`,
    `- Storage: ${formatUsd(breakdown.storage)}`,
    `- Static IPs: ${formatUsd(breakdown.static_ip)}`,
    `- Network: ${formatUsd(report.networkCost)}`,
    "",
    `Issues: ${report.issues.length}`,
    ...report.issues.map((issue) => `• ${issue}`),
    "",
  ].join("\n");
}
