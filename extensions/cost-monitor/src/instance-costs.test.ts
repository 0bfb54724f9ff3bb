import Decimal from "decimal.js-light";
import { describe, expect, it } from "vitest";

import { checkInstanceCosts, formatUptime, renderInstanceCosts } from "./instance-costs.js";
import { fakeInventory, testRates } from "./test-fixtures.js";

const NOW = Date.parse("2026-03-10T12:00:00.000Z");

function check(names: string[], threshold = "5.00") {
  return checkInstanceCosts(names, {
    inventory: fakeInventory(),
    rates: testRates,
    dailyThreshold: new Decimal(threshold),
  });
}

describe("checkInstanceCosts", () => {
  it("breaks a running instance into VM, IP and disk costs", async () => {
    const report = await check(["web-1"]);
    const [web] = report.instances;

    expect(web?.lines.map((l) => [l.label, l.daily.toFixed(2)])).toEqual([
      ["VM (e2-micro)", "0.20"],
      ["Static IP", "0.24"],
      ["Disk (web-1 - 10GB pd-standard)", "0.01"],
    ]);
    expect(web?.total.toFixed(2)).toBe("0.45");
    expect(report.grandTotal.toFixed(2)).toBe("0.45");
    expect(report.exceeded).toBe(false);
  });

  it("prices a stopped VM at zero", async () => {
    const report = await check(["old-1"]);

    expect(report.instances[0]?.lines.map((l) => l.daily.toFixed(2))).toEqual(["0.00"]);
  });

  it("flags a total above the threshold", async () => {
    const report = await check(["web-1"], "0.40");

    expect(report.exceeded).toBe(true);
  });

  it("skips unknown instances", async () => {
    const report = await check(["web-1", "ghost"]);

    expect(report.instances).toHaveLength(1);
    expect(report.skipped).toEqual([{ resource: "ghost", reason: "not_found", detail: "Resource not found: ghost" }]);
  });
});

describe("formatUptime", () => {
  it("formats days and hours", () => {
    expect(formatUptime("2026-03-07T06:00:00.000Z", NOW)).toBe("3d 6h");
  });

  it("is unknown without a start time", () => {
    expect(formatUptime(undefined, NOW)).toBe("Unknown");
  });
});

describe("renderInstanceCosts", () => {
  it("renders the breakdown and totals", async () => {
    const lines = renderInstanceCosts(await check(["web-1", "ghost"], "0.40"), "test-project", NOW).split("\n");

    expect(lines).toContain("INSTANCE: web-1");
    expect(lines).toContain("Uptime: 3d 6h");
    expect(lines).toContain("External IP: 203.0.113.10");
    expect(lines).toContain("VM (e2-micro): $0.20/day");
    expect(lines).toContain("Disk (web-1 - 10GB pd-standard): $0.01/day");
    expect(lines).toContain("Instance Daily Total: $0.45");
    expect(lines).toContain("Error: Resource not found: ghost");
    expect(lines).toContain("TOTAL DAILY COST (all instances): $0.45");
    expect(lines).toContain("⚠️  WARNING: Daily cost exceeds threshold of $0.40");
  });
});
