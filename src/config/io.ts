import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { resolveConfigPath, resolveStateDir, resolveStatePaths, type StatePaths } from "./paths.js";

export class ConfigFileError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigFileError";
  }
}

export type ConfigIOOptions = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  /** `--config` from the command line. */
  configPath?: string;
};

export type ConfigSnapshot = { exists: false } | { exists: true; raw: unknown };

export type ConfigIO = {
  configPath: string;
  paths: StatePaths;
  env: NodeJS.ProcessEnv;
  /** Read and JSON-parse the config file once; validation is the caller's. */
  readConfigFile(): Promise<ConfigSnapshot>;
  /** Write `value` unless the file exists (or `force`). Returns false when skipped. */
  writeConfigFile(value: unknown, opts?: { force?: boolean }): Promise<boolean>;
};

export function createConfigIO(options: ConfigIOOptions = {}): ConfigIO {
  const env = options.env ?? process.env;
  const homedir = options.homedir ?? os.homedir;
  const stateDir = resolveStateDir(env, homedir);
  const configPath = resolveConfigPath(env, stateDir, options.configPath, homedir);

  return {
    configPath,
    paths: resolveStatePaths(stateDir),
    env,

    async readConfigFile() {
      let text: string;
      try {
        text = await fs.readFile(configPath, "utf8");
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return { exists: false };
        throw new ConfigFileError(`Cannot read config file ${configPath}`, configPath, { cause: err });
      }
      try {
        return { exists: true, raw: JSON.parse(text) };
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ConfigFileError(`Config file ${configPath} is not valid JSON: ${detail}`, configPath, { cause: err });
      }
    },

    async writeConfigFile(value, opts) {
      await fs.mkdir(path.dirname(configPath), { recursive: true });
      try {
        await fs.writeFile(configPath, `${JSON.stringify(value, null, 2)}\n`, {
          encoding: "utf8",
          flag: opts?.force ? "w" : "wx",
        });
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "EEXIST") return false;
        throw err;
      }
      return true;
    },
  };
}
