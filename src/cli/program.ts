import { Command, Option } from "commander";

import { registerCostMonitorCli, type CostMonitorCliOptions } from "../../extensions/cost-monitor/src/cli.js";
import { LOG_LEVELS } from "../logging/logger.js";
import { VERSION } from "../version.js";

export function buildProgram(options: CostMonitorCliOptions = {}): Command {
  const program = new Command("gcp-cost-monitor");
  program
    .description("Daily cost estimates, egress pricing and rate-limited webhook alerts for a GCP project")
    .version(VERSION)
    .option("--config <path>", "Configuration file (default: ~/.gcp-cost-monitor/config.json)")
    .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS));

  registerCostMonitorCli(program, options);
  return program;
}
