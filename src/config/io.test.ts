import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { ConfigFileError, createConfigIO } from "./io.js";

async function withTempHome(run: (home: string) => Promise<void>): Promise<void> {
  const home = await fs.mkdtemp(path.join(os.tmpdir(), "cost-monitor-config-"));
  try {
    await run(home);
  } finally {
    await fs.rm(home, { recursive: true, force: true });
  }
}

describe("createConfigIO", () => {
  it("resolves the config under the state dir", async () => {
    await withTempHome(async (home) => {
      const io = createConfigIO({ env: {}, homedir: () => home });

      expect(io.configPath).toBe(path.join(home, ".gcp-cost-monitor", "config.json"));
      expect(io.paths.logsDir).toBe(path.join(home, ".gcp-cost-monitor", "logs"));
    });
  });

  it("reports a missing file without throwing", async () => {
    await withTempHome(async (home) => {
      const io = createConfigIO({ env: {}, homedir: () => home });

      expect(await io.readConfigFile()).toEqual({ exists: false });
    });
  });

  it("parses JSON from an explicit path", async () => {
    await withTempHome(async (home) => {
      const configPath = path.join(home, "monitor.json");
      await fs.writeFile(configPath, JSON.stringify({ projectId: "test-project" }));
      const io = createConfigIO({ env: {}, homedir: () => home, configPath });

      expect(await io.readConfigFile()).toEqual({ exists: true, raw: { projectId: "test-project" } });
    });
  });

  it("rejects invalid JSON", async () => {
    await withTempHome(async (home) => {
      const configPath = path.join(home, "broken.json");
      await fs.writeFile(configPath, "{ projectId: ");
      const io = createConfigIO({ env: {}, homedir: () => home, configPath });

      await expect(io.readConfigFile()).rejects.toBeInstanceOf(ConfigFileError);
    });
  });

  it("writes a new file but does not overwrite without force", async () => {
    await withTempHome(async (home) => {
      const io = createConfigIO({ env: { GCP_COST_MONITOR_STATE_DIR: path.join(home, "state") }, homedir: () => home });

      expect(await io.writeConfigFile({ zone: "us-central1-a" })).toBe(true);
      expect(await io.writeConfigFile({ zone: "europe-west1-b" })).toBe(false);
      expect(JSON.parse(await fs.readFile(io.configPath, "utf8"))).toEqual({ zone: "us-central1-a" });

      expect(await io.writeConfigFile({ zone: "europe-west1-b" }, { force: true })).toBe(true);
      expect(JSON.parse(await fs.readFile(io.configPath, "utf8"))).toEqual({ zone: "europe-west1-b" });
    });
  });
});
