import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { parseLedger } from "../ledger.js";
import { monitorCommand } from "./monitor.js";
import { makeStateDir, TEST_NOW, testContext } from "./test-context.js";

const mockFetch = vi.fn<typeof fetch>();
const NOW_SECONDS = Math.floor(TEST_NOW.getTime() / 1000);

let stateDir: string;

beforeEach(async () => {
  stateDir = await makeStateDir();
  mockFetch.mockReset();
  mockFetch.mockImplementation(async () => new Response("ok"));
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(async () => {
  vi.unstubAllGlobals();
  await fs.rm(stateDir, { recursive: true, force: true });
});

function sentBody(call: number): { attachments?: Array<{ title?: string; text?: string }> } {
  return JSON.parse(String(mockFetch.mock.calls[call]?.[1]?.body));
}

describe("monitorCommand", () => {
  it("alerts on the threshold and unused addresses, then exits 1", async () => {
    const { ctx, events } = testContext(stateDir, {
      thresholds: { dailyCost: "0.50", costIncreasePercent: "20", networkGb: "10" },
    });

    expect(await monitorCommand(ctx)).toBe(1);

    // threshold alert + cost report, then the unused address alert
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(sentBody(0).attachments?.[0]?.text).toContain("*Alert Type:* Daily Cost Threshold");
    expect(sentBody(2).attachments?.[0]?.text).toContain("*Alert Type:* Unused Resources");

    expect(await fs.readFile(ctx.paths.lastCost, "utf8")).toBe("0.82\n");
    const ledger = parseLedger(await fs.readFile(ctx.paths.alertState, "utf8"));
    expect(ledger).toEqual(
      new Map([
        ["cost_threshold", NOW_SECONDS],
        ["unused_resources", NOW_SECONDS],
      ]),
    );
    expect(events("info")).toContain("Current daily cost: $0.82");
    expect(events("warn")).toContain("Daily cost threshold exceeded!");
  });

  it("suppresses alerts inside the cooldown", async () => {
    const overrides = { thresholds: { dailyCost: "0.50", costIncreasePercent: "20" } };
    await monitorCommand(testContext(stateDir, overrides).ctx);
    mockFetch.mockClear();

    const { ctx, events } = testContext(stateDir, overrides);
    expect(await monitorCommand(ctx)).toBe(1);

    expect(mockFetch).not.toHaveBeenCalled();
    expect(events("info")).toContain("Daily Cost Threshold alert already sent recently, skipping");
  });

  it("compares against the previous run's total", async () => {
    const { ctx } = testContext(stateDir);
    await fs.mkdir(ctx.paths.logsDir, { recursive: true });
    await fs.writeFile(ctx.paths.lastCost, "0.50\n");

    expect(await monitorCommand(ctx)).toBe(0);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sentBody(0).attachments?.[0]?.text).toContain("*Message:* Daily costs increased by 64.00% since last check");
    expect(sentBody(0).attachments?.[0]?.text).toContain("*Threshold:* $0.50 (previous)");
    expect(await fs.readFile(ctx.paths.lastCost, "utf8")).toBe("0.82\n");
  });

  it("alerts when measured egress exceeds the network threshold", async () => {
    const { ctx, run } = testContext(stateDir, { monitor: { network: true } });

    expect(await monitorCommand(ctx)).toBe(0);

    expect(run).toHaveBeenCalledOnce();
    expect(sentBody(0).attachments?.[0]?.text).toContain("*Current Value:* 15.000GB");
    expect(sentBody(0).attachments?.[0]?.text).toContain("*Threshold:* 10GB");
  });

  it("keeps the ledger entry when delivery fails", async () => {
    mockFetch.mockImplementation(async () => new Response("invalid_token", { status: 403 }));
    const { ctx, events } = testContext(stateDir, {
      thresholds: { dailyCost: "0.50", costIncreasePercent: "20" },
    });

    expect(await monitorCommand(ctx)).toBe(1);

    const ledger = parseLedger(await fs.readFile(ctx.paths.alertState, "utf8"));
    expect(ledger.get("cost_threshold")).toBe(NOW_SECONDS);
    expect(events("error")).toContain(
      "Failed to send Daily Cost Threshold alert: Webhook did not acknowledge: invalid_token",
    );
  });

  it("skips delivery and the ledger without a webhook", async () => {
    const { ctx, events } = testContext(stateDir, { slack: {} });

    expect(await monitorCommand(ctx)).toBe(0);

    expect(mockFetch).not.toHaveBeenCalled();
    await expect(fs.access(ctx.paths.alertState)).rejects.toThrow();
    expect(events("warn")).toContain("Webhook URL is not configured; skipping alerts");
    expect(await fs.readFile(ctx.paths.lastCost, "utf8")).toBe("0.82\n");
  });
});
