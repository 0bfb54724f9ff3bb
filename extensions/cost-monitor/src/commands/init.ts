/**
 * Non-interactive setup: write a configuration template, create the log
 * directories and print the scheduler lines to install.
 */

import { mkdir } from "node:fs/promises";

import type { ConfigIO } from "../../../../src/config/io.js";
import type { RuntimeEnv } from "../../../../src/runtime.js";
import { createCredentialsManager } from "../../../gcp/src/credentials/index.js";
import { configTemplate } from "../config.js";
import { errorMessage } from "../errors.js";

export type InitOptions = {
  project?: string;
  zone?: string;
  force?: boolean;
};

export type InitDeps = {
  io: ConfigIO;
  runtime: RuntimeEnv;
  /** Defaults to gcloud's active project. */
  resolveProjectId?: () => Promise<string>;
};

export function cronLines(configPath: string): string[] {
  return [
    `0 9 * * * gcp-cost-monitor --config ${configPath} report`,
    `0 * * * * gcp-cost-monitor --config ${configPath} monitor`,
  ];
}

async function discoverProject(deps: InitDeps): Promise<string | undefined> {
  const resolve = deps.resolveProjectId ?? (() => createCredentialsManager().resolveProjectId());
  try {
    return await resolve();
  } catch (err) {
    deps.runtime.error(`Could not detect the GCP project (${errorMessage(err)}); edit projectId in the template`);
    return undefined;
  }
}

export async function initCommand(opts: InitOptions, deps: InitDeps): Promise<number> {
  const { io, runtime } = deps;
  const projectId = opts.project ?? (await discoverProject(deps));

  const written = await io.writeConfigFile(configTemplate(projectId, opts.zone), { force: opts.force });
  runtime.log(
    written
      ? `Wrote configuration template to ${io.configPath}`
      : `Configuration already exists at ${io.configPath} (use --force to overwrite)`,
  );

  await mkdir(io.paths.logsDir, { recursive: true });
  await mkdir(io.paths.reportsDir, { recursive: true });
  runtime.log(`Logs directory: ${io.paths.logsDir}`);

  runtime.log("");
  runtime.log("Next steps:");
  runtime.log("1. Set slack.webhookUrl, instances and the rates in the configuration");
  runtime.log("2. Run `gcp-cost-monitor analyze` for a first analysis");
  runtime.log("3. Run `gcp-cost-monitor notify \"Test message\"` to check the webhook");
  runtime.log("");
  runtime.log("Add these lines to your crontab (crontab -e):");
  for (const line of cronLines(io.configPath)) runtime.log(line);
  return 0;
}
