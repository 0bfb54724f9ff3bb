/**
 * Cost monitor CLI commands.
 */

import type { Command } from "commander";

import { runCommandWithRuntime } from "../../../src/cli/cli-utils.js";
import { createConfigIO, type ConfigIO } from "../../../src/config/io.js";
import { defaultRuntime, type RuntimeEnv } from "../../../src/runtime.js";
import type { CommandContext, ContextLoader, GlobalOptions } from "./commands/context.js";

export type CostMonitorCliOptions = {
  runtime?: RuntimeEnv;
  /** Builds the command context; defaults to reading the config file. */
  loadContext?: ContextLoader;
  createIO?: (globals: GlobalOptions) => ConfigIO;
  resolveProjectId?: () => Promise<string>;
};

export function registerCostMonitorCli(program: Command, options: CostMonitorCliOptions = {}): void {
  const runtime = options.runtime ?? defaultRuntime;
  const globals = () => program.opts<GlobalOptions>();

  const loadContext = async (): Promise<CommandContext> => {
    if (options.loadContext) return options.loadContext(globals(), runtime);
    const { loadCommandContext } = await import("./commands/context.js");
    return loadCommandContext(globals(), runtime);
  };

  program
    .command("analyze")
    .description("Estimate today's cost per category and list optimisation opportunities")
    .action(async () => {
      await runCommandWithRuntime(runtime, async () => {
        const { analyzeCommand } = await import("./commands/analyze.js");
        return analyzeCommand(await loadContext());
      });
    });

  program
    .command("instances")
    .description("Per-instance cost breakdown: VM, external IP and attached disks")
    .argument("[name]", "Instance name (default: every configured instance)")
    .action(async (name: string | undefined) => {
      await runCommandWithRuntime(runtime, async () => {
        const { instancesCommand } = await import("./commands/instances.js");
        return instancesCommand(await loadContext(), name);
      });
    });

  program
    .command("network")
    .description("Probe network counters on running instances and price the egress")
    .argument("[name]", "Instance name (default: every configured instance)")
    .action(async (name: string | undefined) => {
      await runCommandWithRuntime(runtime, async () => {
        const { networkCommand } = await import("./commands/network.js");
        return networkCommand(await loadContext(), name);
      });
    });

  program
    .command("monitor")
    .description("Run the alert pipeline; exits 1 when the daily threshold is exceeded")
    .action(async () => {
      await runCommandWithRuntime(runtime, async () => {
        const { monitorCommand } = await import("./commands/monitor.js");
        return monitorCommand(await loadContext());
      });
    });

  program
    .command("report")
    .description("Send the daily cost report to the webhook")
    .action(async () => {
      await runCommandWithRuntime(runtime, async () => {
        const { reportCommand } = await import("./commands/report.js");
        return reportCommand(await loadContext());
      });
    });

  program
    .command("notify")
    .description("Send a message to the webhook")
    .argument("<message>", "Message text")
    .argument("[color]", "Attachment color", "#36a64f")
    .argument("[title]", "Attachment title", "GCP Cost Monitor")
    .action(async (message: string, color: string, title: string) => {
      await runCommandWithRuntime(runtime, async () => {
        const { notifyCommand } = await import("./commands/notify.js");
        return notifyCommand(await loadContext(), message, color, title);
      });
    });

  program
    .command("init")
    .description("Write a configuration template and print the crontab lines")
    .option("--project <id>", "GCP project ID (default: gcloud's active project)")
    .option("--zone <zone>", "Default zone", "us-central1-a")
    .option("--force", "Overwrite an existing configuration", false)
    .action(async (opts: { project?: string; zone: string; force: boolean }) => {
      await runCommandWithRuntime(runtime, async () => {
        const { initCommand } = await import("./commands/init.js");
        const io = options.createIO?.(globals()) ?? createConfigIO({ configPath: globals().config });
        return initCommand(opts, { io, runtime, resolveProjectId: options.resolveProjectId });
      });
    });
}
