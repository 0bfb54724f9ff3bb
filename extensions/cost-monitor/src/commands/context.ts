/**
 * Everything a command needs, built once from the configuration file.
 */

import { createConfigIO, type ConfigIO } from "../../../../src/config/io.js";
import type { StatePaths } from "../../../../src/config/paths.js";
import { createLogger, type Logger, type LogLevel } from "../../../../src/logging/logger.js";
import type { RuntimeEnv } from "../../../../src/runtime.js";
import { createComputeManager } from "../../../gcp/src/compute/index.js";
import { createCredentialsManager } from "../../../gcp/src/credentials/index.js";
import { createNetworkManager } from "../../../gcp/src/network/index.js";
import { GcloudSshExecutor, type RemoteExecutor } from "../../../gcp/src/ssh/index.js";
import { loadCostMonitorConfig, resolveWebhookUrl, type CostMonitorConfig } from "../config.js";
import { runCostAnalysis, type CostAnalysis } from "../analysis.js";
import { InvalidConfigurationError, InvalidArgumentError } from "../errors.js";
import { GcpInventory } from "../inventory.js";
import { collectNetworkUsage, type NetworkUsageReport } from "../network-usage.js";
import { createRateTable, type RateTable } from "../rates.js";
import { SlackNotifier } from "../slack.js";

/** Options on the root program. */
export type GlobalOptions = {
  config?: string;
  logLevel?: LogLevel;
};

export type CommandContext = {
  config: CostMonitorConfig;
  paths: StatePaths;
  rates: RateTable;
  logger: Logger;
  inventory: GcpInventory;
  executor: RemoteExecutor;
  /** Undefined when no webhook URL is configured. */
  notifier: SlackNotifier | undefined;
  runtime: RuntimeEnv;
  now: () => Date;
  /** Logger that also appends to an event log file. Close it when done. */
  openEventLog: (subsystem: string, filePath: string) => Logger;
};

export type ContextLoader = (globals: GlobalOptions, runtime: RuntimeEnv) => Promise<CommandContext>;

export function createNotifier(config: CostMonitorConfig, logger: Logger, now?: () => Date): SlackNotifier | undefined {
  const webhookUrl = resolveWebhookUrl(config);
  if (!webhookUrl) return undefined;
  return new SlackNotifier({
    webhookUrl,
    projectId: config.projectId,
    channel: config.slack.channel,
    username: config.slack.username,
    icon: config.slack.icon,
    dailyThreshold: config.thresholds.dailyCost,
    mentions: config.alerts.mentions,
    timeoutMs: config.slack.timeoutMs,
    logger: logger.child("slack"),
    now,
  });
}

/** @throws InvalidConfigurationError when no webhook URL is configured. */
export function requireNotifier(ctx: Pick<CommandContext, "notifier">): SlackNotifier {
  if (!ctx.notifier) {
    throw new InvalidConfigurationError(
      "Webhook URL is not configured (set slack.webhookUrl or SLACK_WEBHOOK_URL)",
    );
  }
  return ctx.notifier;
}

export async function loadCommandContext(
  globals: GlobalOptions,
  runtime: RuntimeEnv,
  io: ConfigIO = createConfigIO({ configPath: globals.config }),
): Promise<CommandContext> {
  const config = await loadCostMonitorConfig(io);
  const rates = createRateTable(config.rates);
  const level = globals.logLevel ?? config.logLevel;
  const logger = createLogger("cost-monitor", { level });

  const credentials = createCredentialsManager({
    projectId: config.projectId,
    credentialMethod: config.gcp.credentialMethod,
    retry: config.gcp.retry,
  });
  const getAccessToken = () => credentials.getAccessToken();
  const compute = createComputeManager(config.projectId, getAccessToken, config.gcp.retry);
  const network = createNetworkManager(config.projectId, getAccessToken, config.gcp.retry);

  return {
    config,
    paths: io.paths,
    rates,
    logger,
    inventory: new GcpInventory({ compute, network }, config.zone),
    executor: new GcloudSshExecutor({ timeoutMs: config.gcp.sshTimeoutMs }),
    notifier: createNotifier(config, logger),
    runtime,
    now: () => new Date(),
    openEventLog: (subsystem, filePath) => createLogger(subsystem, { level, filePath }),
  };
}

/** Cost analysis over the configured instances and enabled categories. */
export function runProjectAnalysis(ctx: CommandContext): Promise<CostAnalysis> {
  const { config } = ctx;
  return runCostAnalysis(ctx.inventory, {
    projectId: config.projectId,
    instances: config.instances,
    monitor: config.monitor,
    rates: ctx.rates,
    now: ctx.now,
  });
}

export function collectProjectNetworkUsage(
  ctx: CommandContext,
  names: readonly string[],
  logger: Logger = ctx.logger,
): Promise<NetworkUsageReport> {
  return collectNetworkUsage(names, {
    inventory: ctx.inventory,
    executor: ctx.executor,
    projectId: ctx.config.projectId,
    zone: ctx.config.zone,
    rates: ctx.rates,
    logger,
    now: () => ctx.now().getTime(),
  });
}

/** A name given on the command line, else every configured instance. */
export function targetInstances(ctx: Pick<CommandContext, "config">, name?: string): string[] {
  if (name) return [name];
  if (ctx.config.instances.length === 0) {
    throw new InvalidArgumentError("No instances configured; pass an instance name or set `instances`");
  }
  return ctx.config.instances;
}
