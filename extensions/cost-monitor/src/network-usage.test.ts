import Decimal from "decimal.js-light";
import { describe, expect, it, vi } from "vitest";

import type { GcpComputeInstance } from "../../gcp/src/compute/index.js";
import { RemoteExecutionError, type RemoteExecutor } from "../../gcp/src/ssh/index.js";
import { createMemoryLogger, formatLocalTimestamp } from "../../../src/logging/logger.js";
import { NotFoundError } from "./errors.js";
import type { GcpInventory } from "./inventory.js";
import { collectNetworkUsage, egressOverThreshold, renderNetworkUsage, uptimeDays } from "./network-usage.js";
import { createRateTable } from "./rates.js";

const NOW = Date.parse("2026-03-10T12:00:00Z");
const GIB = 1073741824;

const rates = createRateTable({
  machineTypes: {},
  staticIpMonthly: "7.30",
  standardDiskGbMonthly: "0.04",
  ssdDiskGbMonthly: "0.17",
  networkFreeTierGb: "1",
  networkEgressPerGb: "0.12",
});

function instance(name: string, status: string, lastStartedAt?: string): GcpComputeInstance {
  return {
    name,
    zone: "us-central1-a",
    machineType: "e2-small",
    status,
    networkInterfaces: [],
    disks: [],
    labels: {},
    createdAt: "2026-01-01T00:00:00Z",
    lastStartedAt,
  };
}

const described: Record<string, GcpComputeInstance> = {
  "web-1": instance("web-1", "RUNNING", "2026-03-07T06:00:00Z"),
  "db-1": instance("db-1", "RUNNING", "2026-03-10T02:00:00Z"),
  stopped: instance("stopped", "TERMINATED"),
  flaky: instance("flaky", "RUNNING", "2026-03-01T00:00:00Z"),
};

function probeOutput(rx: number, tx: number): string {
  return `EXPORT_INTERFACE=ens4\nEXPORT_RX_BYTES=${rx}\nEXPORT_TX_BYTES=${tx}\nEXPORT_RX_RATE=100\nEXPORT_TX_RATE=50\n`;
}

function setup() {
  const inventory: Pick<GcpInventory, "describeInstance"> = {
    describeInstance: vi.fn(async (name: string) => {
      const found = described[name];
      if (!found) throw new NotFoundError(name);
      return found;
    }),
  };
  const run = vi.fn<RemoteExecutor["run"]>(async (target) => {
    if (target.instance === "web-1") return probeOutput(GIB, 6 * GIB);
    if (target.instance === "db-1") return probeOutput(0, GIB / 2);
    throw new RemoteExecutionError("ssh to flaky failed: exit 255", "flaky");
  });
  const { logger, transport } = createMemoryLogger("network");
  return { inventory, run, logger, transport };
}

describe("uptimeDays", () => {
  it("counts whole days since the last start", () => {
    expect(uptimeDays(instance("a", "RUNNING", "2026-03-07T06:00:00Z"), NOW)).toBe(3);
  });

  it("is zero without a start time", () => {
    expect(uptimeDays(instance("a", "RUNNING"), NOW)).toBe(0);
  });
});

describe("collectNetworkUsage", () => {
  it("prices probed instances and skips the rest", async () => {
    const { inventory, run, logger } = setup();

    const report = await collectNetworkUsage(["web-1", "db-1", "gone", "stopped", "flaky"], {
      inventory,
      executor: { run },
      projectId: "test-project",
      zone: "us-central1-a",
      rates,
      logger,
      now: () => NOW,
    });

    expect(report.instances.map((u) => u.instance)).toEqual(["web-1", "db-1"]);

    const [web, db] = report.instances;
    expect(web?.egressCost.toFixed(2)).toBe("0.60");
    expect(web?.uptimeDays).toBe(3);
    expect(web?.dailyAverageGb?.toString()).toBe("2");
    expect(web?.dailyCost?.toFixed(2)).toBe("0.12");
    expect(db?.egressCost.toFixed(2)).toBe("0.00");
    expect(db?.dailyCost).toBeUndefined();

    expect(report.skipped).toEqual([
      { resource: "gone", reason: "not_found", detail: "Resource not found: gone" },
      { resource: "stopped", reason: "not_running", detail: "stopped is TERMINATED (not running)" },
      { resource: "flaky", reason: "unreachable", detail: "flaky unreachable: ssh to flaky failed: exit 255" },
    ]);

    expect(report.totalRxBytes).toBe(GIB);
    expect(report.totalTxBytes).toBe(6.5 * GIB);
    expect(report.totalEgressGb.toString()).toBe("6.5");
    expect(report.totalEgressCost.toFixed(2)).toBe("0.66");
    expect(report.dailyCost.toFixed(2)).toBe("0.12");
  });

  it("sends the probe script to the instance's zone", async () => {
    const { inventory, run } = setup();

    await collectNetworkUsage(["web-1"], {
      inventory,
      executor: { run },
      projectId: "test-project",
      zone: "europe-west1-b",
      rates,
      now: () => NOW,
    });

    expect(run).toHaveBeenCalledWith(
      { instance: "web-1", zone: "us-central1-a", projectId: "test-project" },
      expect.stringContaining("EXPORT_TX_BYTES"),
    );
  });

  it("treats output without counters as unreachable", async () => {
    const { inventory, logger, transport } = setup();

    const report = await collectNetworkUsage(["web-1"], {
      inventory,
      executor: { run: async () => "Connection closed\n" },
      projectId: "test-project",
      zone: "us-central1-a",
      rates,
      logger,
      now: () => NOW,
    });

    expect(report.instances).toEqual([]);
    expect(report.skipped[0]?.detail).toBe("web-1 unreachable: probe returned no byte counters");
    expect(transport.messages("warn")).toEqual(["web-1 unreachable: probe returned no byte counters"]);
  });
});

describe("renderNetworkUsage", () => {
  async function probedReport() {
    const { inventory, run } = setup();
    return collectNetworkUsage(["web-1", "db-1"], {
      inventory,
      executor: { run },
      projectId: "test-project",
      zone: "us-central1-a",
      rates,
      now: () => NOW,
    });
  }

  it("prints per-instance egress, totals and the threshold alert", async () => {
    const report = await probedReport();

    const lines = renderNetworkUsage(report, {
      projectId: "test-project",
      thresholdGb: new Decimal(5),
      now: new Date(NOW),
    }).split("\n");

    expect(lines).toContain(`Date: ${formatLocalTimestamp(new Date(NOW))}`);
    expect(lines).toContain("INSTANCE: web-1");
    expect(lines).toContain("  TX (Sent):     6.00GB");
    expect(lines).toContain("Total egress: 6.00GB (6.000 GB)");
    expect(lines).toContain("Estimated total cost: $0.60");
    expect(lines).toContain("Daily average: 2.00 GB ($0.12/day)");
    expect(lines).toContain("Total egress: 512.00MB (0.500 GB)");
    expect(lines).toContain("Total TX (all instances): 6.50GB");
    expect(lines).toContain("Total egress cost: $0.66");
    expect(lines).toContain("⚠️  ALERT: Network egress (6.500 GB) exceeds threshold (5 GB)");
    expect(lines.at(-1)).toBe("https://console.cloud.google.com/networking/networks/list?project=test-project");
  });

  it("omits the alert under the threshold", async () => {
    const report = await probedReport();

    const text = renderNetworkUsage(report, { projectId: "p", thresholdGb: new Decimal(10), now: new Date(NOW) });

    expect(egressOverThreshold(report, new Decimal(10))).toBe(false);
    expect(egressOverThreshold(report, undefined)).toBe(false);
    expect(text.split("\n").some((line) => line.startsWith("⚠️  ALERT"))).toBe(false);
  });
});
