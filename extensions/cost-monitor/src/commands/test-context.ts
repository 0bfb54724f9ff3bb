/**
 * Command context over the in-memory sample project, a temporary state
 * directory and a runtime that records its output.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { vi, type Mock } from "vitest";

import { resolveStatePaths } from "../../../../src/config/paths.js";
import { createMemoryLogger } from "../../../../src/logging/logger.js";
import type { RuntimeEnv } from "../../../../src/runtime.js";
import type { RemoteExecutor } from "../../../gcp/src/ssh/index.js";
import { parseCostMonitorConfig, type CostMonitorConfigInput } from "../config.js";
import { createRateTable } from "../rates.js";
import { fakeInventory } from "../test-fixtures.js";
import { createNotifier, type CommandContext } from "./context.js";

export const TEST_NOW = new Date("2026-03-10T12:00:00Z");
export const TEST_WEBHOOK = "https://hooks.example.test/services/test-hook";

export function testConfigInput(overrides: Partial<CostMonitorConfigInput> = {}): CostMonitorConfigInput {
  return {
    projectId: "test-project",
    zone: "us-central1-a",
    instances: ["web-1"],
    rates: {
      machineTypes: { "e2-micro": "6.00", "e2-small": "12.23", "e2-medium": "24.46" },
      staticIpMonthly: "7.30",
      standardDiskGbMonthly: "0.04",
      ssdDiskGbMonthly: "0.17",
      networkFreeTierGb: "1",
      networkEgressPerGb: "0.12",
    },
    thresholds: { dailyCost: "5.00", costIncreasePercent: "20", networkGb: "10" },
    monitor: { network: false },
    slack: { webhookUrl: TEST_WEBHOOK },
    ...overrides,
  };
}

export class ExitCalled extends Error {
  constructor(readonly code: number) {
    super(`exit ${code}`);
  }
}

export function recordingRuntime() {
  const lines: string[] = [];
  const errors: string[] = [];
  const runtime: RuntimeEnv = {
    log: (...args) => lines.push(args.map(String).join(" ")),
    error: (...args) => errors.push(args.map(String).join(" ")),
    exit: (code) => {
      throw new ExitCalled(code);
    },
  };
  return { runtime, lines, errors };
}

export async function makeStateDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "cost-monitor-cmd-"));
}

export type TestContext = {
  ctx: CommandContext;
  lines: string[];
  errors: string[];
  /** Messages written to event logs. */
  events: (level?: "info" | "warn" | "error") => string[];
  run: Mock<RemoteExecutor["run"]>;
};

/** Pass `{ slack: {} }` for a context without a webhook. */
export function testContext(stateDir: string, overrides: Partial<CostMonitorConfigInput> = {}): TestContext {
  const config = parseCostMonitorConfig(testConfigInput(overrides));

  const { runtime, lines, errors } = recordingRuntime();
  const { logger, transport } = createMemoryLogger("cost-monitor");
  const run = vi.fn<RemoteExecutor["run"]>(
    // 1 GiB received, 15 GiB sent
    async () => "EXPORT_INTERFACE=ens4\nEXPORT_RX_BYTES=1073741824\nEXPORT_TX_BYTES=16106127360\n",
  );
  const now = () => TEST_NOW;

  const ctx: CommandContext = {
    config,
    paths: resolveStatePaths(stateDir),
    rates: createRateTable(config.rates),
    logger,
    inventory: fakeInventory(),
    executor: { run },
    notifier: createNotifier(config, logger, now),
    runtime,
    now,
    openEventLog: (subsystem) => logger.child(subsystem),
  };
  return { ctx, lines, errors, events: (level) => transport.messages(level), run };
}
