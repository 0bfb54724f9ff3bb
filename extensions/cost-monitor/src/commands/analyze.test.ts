import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { analysisLogPath } from "../../../../src/config/paths.js";
import { analyzeCommand } from "./analyze.js";
import { makeStateDir, TEST_NOW, testContext } from "./test-context.js";

let stateDir: string;

beforeEach(async () => {
  stateDir = await makeStateDir();
});

afterEach(async () => {
  await fs.rm(stateDir, { recursive: true, force: true });
});

describe("analyzeCommand", () => {
  it("prints the analysis and saves the summary log", async () => {
    const { ctx, lines } = testContext(stateDir);

    expect(await analyzeCommand(ctx)).toBe(0);

    expect(lines[0]?.split("\n")).toContain("TOTAL ESTIMATED DAILY COST: $0.82");
    const logPath = analysisLogPath(ctx.paths, TEST_NOW);
    expect(lines.at(-1)).toBe(`Report saved to: ${logPath}`);
    expect((await fs.readFile(logPath, "utf8")).split("\n")[2]).toBe("Total Daily Cost: $0.82");
  });
});
