import { describe, expect, it } from "vitest";

import { networkCommand } from "./network.js";
import { testContext } from "./test-context.js";

describe("networkCommand", () => {
  it("probes the configured instances and prints the egress estimate", async () => {
    const { ctx, lines, run } = testContext("/nonexistent");

    expect(await networkCommand(ctx)).toBe(0);

    expect(run).toHaveBeenCalledWith(
      { instance: "web-1", zone: "us-central1-a", projectId: "test-project" },
      expect.stringContaining("EXPORT_TX_BYTES"),
    );
    const output = lines[0]?.split("\n") ?? [];
    expect(output).toContain("Total egress: 15.00GB (15.000 GB)");
    expect(output).toContain("Estimated total cost: $1.68");
    expect(output).toContain("⚠️  ALERT: Network egress (15.000 GB) exceeds threshold (10 GB)");
  });

  it("reports a missing instance as skipped", async () => {
    const { ctx, lines, run } = testContext("/nonexistent");

    await networkCommand(ctx, "ghost");

    expect(run).not.toHaveBeenCalled();
    expect(lines[0]?.split("\n")).toContain("Skipped: Resource not found: ghost");
  });
});
