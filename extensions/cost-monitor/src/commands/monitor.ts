/**
 * One alert pipeline run: estimate, compare with the previous run, check
 * egress and unused addresses, then deliver whatever the cooldown ledger
 * lets through. Exits 1 when the daily threshold is exceeded.
 */

import type { Logger } from "../../../../src/logging/logger.js";
import { breakdownLines } from "../analysis.js";
import { cooldownFor } from "../config.js";
import { bulletList, WebhookAlertDispatcher } from "../dispatcher.js";
import { CostHistoryFile } from "../history.js";
import { FileAlertLedgerStore } from "../ledger-store.js";
import { formatUsd } from "../money.js";
import { buildAlertCandidates, evaluateAlerts, thresholdExceeded, type AlertOutcome } from "../pipeline.js";
import { collectProjectNetworkUsage, runProjectAnalysis, type CommandContext } from "./context.js";

export async function monitorCommand(ctx: CommandContext): Promise<number> {
  const log = ctx.openEventLog("monitor", ctx.paths.costAlertsLog);
  try {
    return await runMonitor(ctx, log);
  } finally {
    await log.close();
  }
}

async function runMonitor(ctx: CommandContext, log: Logger): Promise<number> {
  const { config, paths } = ctx;
  log.info(`Starting cost alert monitoring for project: ${config.projectId}`);

  log.info("Running cost analysis...");
  const analysis = await runProjectAnalysis(ctx);
  for (const skipped of analysis.snapshot.skipped) log.warn(`Skipped ${skipped.detail}`);

  const { total } = analysis.estimate;
  log.info(`Current daily cost: ${formatUsd(total)}`);
  const exceeded = thresholdExceeded({ total }, config.thresholds);
  if (exceeded) log.warn("Daily cost threshold exceeded!");

  const history = new CostHistoryFile(paths.lastCost, log);
  const previousTotal = await history.read();
  await history.write(total);

  let egressBytes: number | undefined;
  if (config.monitor.network && config.instances.length > 0) {
    log.info("Checking network usage...");
    const usage = await collectProjectNetworkUsage(ctx, config.instances, log);
    if (usage.instances.length > 0) egressBytes = usage.totalTxBytes;
  }

  const { unusedStaticIps, unusedStaticIpDaily } = analysis.findings;
  const candidates = buildAlertCandidates(
    { total, previousTotal, egressBytes, unusedStaticIps: unusedStaticIps.length, unusedStaticIpDaily },
    config.thresholds,
    { monitorNetwork: config.monitor.network, sendOkStatus: config.alerts.sendOkStatus },
  );
  for (const candidate of candidates) {
    if (candidate.triggered && candidate.category !== "daily_ok_status") log.warn(candidate.message);
  }

  if (ctx.notifier) {
    const outcomes = await evaluateAlerts(candidates, {
      store: new FileAlertLedgerStore({ filePath: paths.alertState, logger: log }),
      dispatcher: new WebhookAlertDispatcher(ctx.notifier, {
        total,
        breakdown: bulletList(breakdownLines(analysis)),
      }),
      cooldownFor: (category) => cooldownFor(config, category),
      now: () => Math.floor(ctx.now().getTime() / 1000),
      logger: log,
    });
    logSummary(outcomes, log);
  } else {
    log.warn("Webhook URL is not configured; skipping alerts");
  }

  log.info("Alert monitoring completed");
  return exceeded ? 1 : 0;
}

function logSummary(outcomes: AlertOutcome[], log: Logger): void {
  const count = (status: AlertOutcome["status"]) => outcomes.filter((o) => o.status === status).length;
  log.info(
    `Alerts: ${count("delivered")} sent, ${count("suppressed")} suppressed, ` +
      `${count("delivery_failed")} failed, ${count("ledger_failed")} not recorded`,
  );
}
