/**
 * Daily webhook report. The total is remembered and the report archived
 * only after the webhook acknowledges it.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { reportArchivePath } from "../../../../src/config/paths.js";
import type { Logger } from "../../../../src/logging/logger.js";
import { buildDailyReport, buildDailyReportPayload, renderReportArchive, type DailyReportInput } from "../daily-report.js";
import { CostHistoryFile } from "../history.js";
import { ensureDelivered, type SlackNotifier } from "../slack.js";
import { collectProjectNetworkUsage, requireNotifier, runProjectAnalysis, type CommandContext } from "./context.js";

export async function reportCommand(ctx: CommandContext): Promise<number> {
  if (!ctx.config.dailyReports.enabled) {
    ctx.runtime.log("Daily reports are disabled in the configuration");
    return 0;
  }
  const notifier = requireNotifier(ctx);

  const log = ctx.openEventLog("report", ctx.paths.dailyReportsLog);
  try {
    return await sendDailyReport(ctx, notifier, log);
  } finally {
    await log.close();
  }
}

async function sendDailyReport(ctx: CommandContext, notifier: SlackNotifier, log: Logger): Promise<number> {
  const { config, paths } = ctx;
  log.info("Starting daily report generation");

  log.info("Running comprehensive cost analysis...");
  const analysis = await runProjectAnalysis(ctx);
  for (const skipped of analysis.snapshot.skipped) log.warn(`Skipped ${skipped.detail}`);

  const history = new CostHistoryFile(paths.lastDailyTotal, log);
  const input: DailyReportInput = {
    analysis,
    dailyThreshold: config.thresholds.dailyCost,
    previousTotal: await history.read(),
  };

  if (config.monitor.network && config.instances.length > 0) {
    log.info("Collecting network usage...");
    const usage = await collectProjectNetworkUsage(ctx, config.instances, log);
    if (usage.instances.length > 0) {
      input.network = { totalTxBytes: usage.totalTxBytes, dailyCost: usage.dailyCost };
    }
  }

  const report = buildDailyReport(input);
  log.info("Sending report to webhook...");
  const result = await notifier.post(buildDailyReportPayload(report, notifier));
  if (!result.success) log.error(`Error sending report: ${result.error ?? "unknown error"}`);
  ensureDelivered(result, "daily report");
  log.info("Daily report sent successfully");

  await history.write(report.total);
  const archivePath = reportArchivePath(paths, report.date);
  await mkdir(dirname(archivePath), { recursive: true });
  await writeFile(archivePath, renderReportArchive(report), "utf8");
  log.info(`Report archived to: ${archivePath}`);

  log.info("Daily report completed successfully");
  return 0;
}
