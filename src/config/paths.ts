import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "GCP_COST_MONITOR_STATE_DIR";
export const CONFIG_PATH_ENV = "GCP_COST_MONITOR_CONFIG";
export const DEFAULT_STATE_DIRNAME = ".gcp-cost-monitor";
export const CONFIG_FILENAME = "config.json";

function expandHome(input: string, homedir: () => string): string {
  if (input === "~") return homedir();
  if (input.startsWith("~/")) return path.join(homedir(), input.slice(2));
  return input;
}

/**
 * State directory: `$GCP_COST_MONITOR_STATE_DIR`, else `~/.gcp-cost-monitor`.
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) return path.resolve(expandHome(override, homedir));
  return path.join(homedir(), DEFAULT_STATE_DIRNAME);
}

/**
 * Config file: explicit path, else `$GCP_COST_MONITOR_CONFIG`, else
 * `<stateDir>/config.json`.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env),
  explicit?: string,
  homedir: () => string = os.homedir,
): string {
  const chosen = explicit?.trim() || env[CONFIG_PATH_ENV]?.trim();
  if (chosen) return path.resolve(expandHome(chosen, homedir));
  return path.join(stateDir, CONFIG_FILENAME);
}

export type StatePaths = {
  stateDir: string;
  logsDir: string;
  /** Append-only event log of monitor runs. */
  costAlertsLog: string;
  /** Append-only event log of daily report runs. */
  dailyReportsLog: string;
  alertState: string;
  lastCost: string;
  lastDailyTotal: string;
  reportsDir: string;
};

export function resolveStatePaths(stateDir: string): StatePaths {
  const logsDir = path.join(stateDir, "logs");
  return {
    stateDir,
    logsDir,
    costAlertsLog: path.join(logsDir, "cost-alerts.log"),
    dailyReportsLog: path.join(logsDir, "daily-reports.log"),
    alertState: path.join(logsDir, ".alert-state"),
    lastCost: path.join(logsDir, "last-cost.txt"),
    lastDailyTotal: path.join(logsDir, "last-daily-total.txt"),
    reportsDir: path.join(logsDir, "reports"),
  };
}

/** `YYYY-MM-DD` in local time. */
export function localDateStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function analysisLogPath(paths: StatePaths, date: Date): string {
  return path.join(paths.logsDir, `cost-analysis-${localDateStamp(date)}.log`);
}

export function reportArchivePath(paths: StatePaths, date: Date): string {
  return path.join(paths.reportsDir, `${localDateStamp(date)}-report.txt`);
}
