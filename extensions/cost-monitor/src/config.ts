/**
 * Cost monitor configuration schema and loader.
 */

import Decimal from "decimal.js-light";
import { z } from "zod";

import { ConfigFileError, type ConfigIO, type ConfigSnapshot } from "../../../src/config/io.js";
import { InvalidConfigurationError } from "./errors.js";
import { DEFAULT_COOLDOWN_SECONDS } from "./ledger.js";
import { ALERT_CATEGORIES, type AlertCategory } from "./types.js";

/** Webhook URL shipped in the config template; treated as unset. */
export const PLACEHOLDER_WEBHOOK_URL = "https://hooks.slack.com/services/YOUR/WEBHOOK/URL";

// =============================================================================
// Zod Schemas
// =============================================================================

/** Non-negative decimal given as a JSON number or a decimal string. */
const decimalSchema = z
  .union([
    z.number().nonnegative().finite(),
    z.string().regex(/^\d+(\.\d+)?$/, "expected a non-negative decimal such as \"6.11\""),
  ])
  .transform((value) => new Decimal(value));

export const ratesSchema = z.object({
  machineTypes: z.record(z.string(), decimalSchema).default({}),
  staticIpMonthly: decimalSchema,
  standardDiskGbMonthly: decimalSchema,
  ssdDiskGbMonthly: decimalSchema,
  networkFreeTierGb: decimalSchema,
  networkEgressPerGb: decimalSchema,
});

export const thresholdsSchema = z.object({
  dailyCost: decimalSchema,
  costIncreasePercent: decimalSchema,
  networkGb: decimalSchema.optional(),
});

export const alertsSchema = z.object({
  cooldownSeconds: z.number().int().positive().default(DEFAULT_COOLDOWN_SECONDS),
  cooldownOverrides: z.record(z.enum(ALERT_CATEGORIES), z.number().int().positive()).default({}),
  sendOkStatus: z.boolean().default(false),
  /** Prepended to alert messages, e.g. `<!channel>`. */
  mentions: z.string().default(""),
});

export const monitorSchema = z.object({
  compute: z.boolean().default(true),
  staticIp: z.boolean().default(true),
  storage: z.boolean().default(true),
  network: z.boolean().default(true),
});

export const slackSchema = z.object({
  webhookUrl: z.string().url().optional(),
  channel: z.string().default("#gcp-costs"),
  username: z.string().default("GCP Cost Monitor"),
  icon: z.string().default(":money_with_wings:"),
  timeoutMs: z.number().int().positive().default(10_000),
});

export const gcpSchema = z.object({
  credentialMethod: z.enum(["gcloud-cli", "workload-identity"]).default("gcloud-cli"),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().optional(),
      minDelayMs: z.number().nonnegative().optional(),
      maxDelayMs: z.number().nonnegative().optional(),
      jitterFactor: z.number().min(0).max(1).optional(),
    })
    .default({}),
  sshTimeoutMs: z.number().int().positive().default(60_000),
});

export const costMonitorConfigSchema = z.object({
  projectId: z.string().min(1),
  zone: z.string().min(1),
  instances: z.array(z.string().min(1)).default([]),
  rates: ratesSchema,
  thresholds: thresholdsSchema,
  alerts: alertsSchema.default({}),
  monitor: monitorSchema.default({}),
  dailyReports: z.object({ enabled: z.boolean().default(true) }).default({}),
  slack: slackSchema.default({}),
  gcp: gcpSchema.default({}),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
});

export type CostMonitorConfig = z.infer<typeof costMonitorConfigSchema>;
export type CostMonitorConfigInput = z.input<typeof costMonitorConfigSchema>;

// =============================================================================
// Loading
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `SLACK_WEBHOOK_URL` and `GCP_PROJECT_ID` win over the file. */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) return raw;
  const merged: Record<string, unknown> = { ...raw };

  const projectId = env.GCP_PROJECT_ID?.trim();
  if (projectId) merged.projectId = projectId;

  const webhookUrl = env.SLACK_WEBHOOK_URL?.trim();
  if (webhookUrl) {
    merged.slack = { ...(isRecord(merged.slack) ? merged.slack : {}), webhookUrl };
  }
  return merged;
}

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

/**
 * Validate a parsed config document.
 *
 * @throws InvalidConfigurationError listing every schema violation.
 */
export function parseCostMonitorConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): CostMonitorConfig {
  const result = costMonitorConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    throw new InvalidConfigurationError("Invalid configuration", result.error.issues.map(formatIssue));
  }
  return result.data;
}

export async function loadCostMonitorConfig(io: ConfigIO): Promise<CostMonitorConfig> {
  let snapshot: ConfigSnapshot;
  try {
    snapshot = await io.readConfigFile();
  } catch (err) {
    if (err instanceof ConfigFileError) throw new InvalidConfigurationError(err.message);
    throw err;
  }
  if (!snapshot.exists) {
    throw new InvalidConfigurationError(
      `Configuration file not found: ${io.configPath} (run \`gcp-cost-monitor init\` to create one)`,
    );
  }
  return parseCostMonitorConfig(snapshot.raw, io.env);
}

/** Webhook URL, or undefined when unset or still the template placeholder. */
export function resolveWebhookUrl(config: CostMonitorConfig): string | undefined {
  const url = config.slack.webhookUrl;
  return url && url !== PLACEHOLDER_WEBHOOK_URL ? url : undefined;
}

export function cooldownFor(config: CostMonitorConfig, category: AlertCategory): number {
  return config.alerts.cooldownOverrides[category] ?? config.alerts.cooldownSeconds;
}

// =============================================================================
// Template
// =============================================================================

/** Starting configuration written by `init`. */
export function configTemplate(projectId = "your-project-id", zone = "us-central1-a"): CostMonitorConfigInput {
  return {
    projectId,
    zone,
    instances: ["instance-1"],
    rates: {
      machineTypes: { "e2-micro": "6.11", "e2-small": "12.23", "e2-medium": "24.46" },
      staticIpMonthly: "7.30",
      standardDiskGbMonthly: "0.04",
      ssdDiskGbMonthly: "0.17",
      networkFreeTierGb: "1",
      networkEgressPerGb: "0.12",
    },
    thresholds: { dailyCost: "5.00", costIncreasePercent: "20", networkGb: "10" },
    alerts: { cooldownSeconds: DEFAULT_COOLDOWN_SECONDS, sendOkStatus: false, mentions: "" },
    monitor: { compute: true, staticIp: true, storage: true, network: true },
    dailyReports: { enabled: true },
    slack: {
      webhookUrl: PLACEHOLDER_WEBHOOK_URL,
      channel: "#gcp-costs",
      username: "GCP Cost Monitor",
      icon: ":money_with_wings:",
    },
    gcp: { credentialMethod: "gcloud-cli" },
    logLevel: "info",
  };
}
