/**
 * GCP Extension: Credentials Manager
 *
 * Resolves OAuth2 access tokens through the gcloud CLI (operator
 * workstations) or the GCE metadata server (workload identity), with a
 * token cache that refreshes five minutes before expiry.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { isJsonObject, readNumber, readString } from "../api.js";
import { withGcpRetry } from "../retry.js";
import type { GcpCredentialMethod, GcpRetryOptions } from "../types.js";

const execFileAsync = promisify(execFile);

// =============================================================================
// Types
// =============================================================================

/** Runs an executable and resolves with its stdout. */
export type CommandRunner = (file: string, args: string[]) => Promise<string>;

export type GcpCredentialsManagerOptions = {
  projectId?: string;
  credentialMethod?: GcpCredentialMethod;
  retry?: GcpRetryOptions;
  /** Overrides how `gcloud` is invoked. */
  runCommand?: CommandRunner;
  now?: () => number;
};

type IssuedToken = { token: string; expiresInSeconds: number };

// =============================================================================
// Constants
// =============================================================================

const METADATA_BASE = "http://metadata.google.internal/computeMetadata/v1";
const METADATA_TOKEN_URL = `${METADATA_BASE}/instance/service-accounts/default/token`;
const METADATA_PROJECT_URL = `${METADATA_BASE}/project/project-id`;
const GCLOUD_TOKEN_LIFETIME_SECONDS = 3600;
const REFRESH_MARGIN_MS = 300_000;

const defaultRunCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, args, { encoding: "utf8" });
  return stdout;
};

// =============================================================================
// Token cache
// =============================================================================

class CredentialCache {
  private entry: { token: string; expiresAt: number } | null = null;

  constructor(private readonly now: () => number) {}

  get(): string | null {
    if (!this.entry) return null;
    if (this.now() > this.entry.expiresAt - REFRESH_MARGIN_MS) {
      this.entry = null;
      return null;
    }
    return this.entry.token;
  }

  set(token: string, expiresInSeconds: number): void {
    this.entry = { token, expiresAt: this.now() + expiresInSeconds * 1000 };
  }
}

// =============================================================================
// Token sources
// =============================================================================

async function fetchMetadataToken(): Promise<IssuedToken> {
  const res = await fetch(METADATA_TOKEN_URL, { headers: { "Metadata-Flavor": "Google" } });
  if (!res.ok) {
    throw new Error(`Metadata server token request failed (HTTP ${res.status})`);
  }
  const body: unknown = await res.json();
  const token = isJsonObject(body) ? readString(body, "access_token") : undefined;
  if (!token || !isJsonObject(body)) {
    throw new Error("Metadata server returned no access token");
  }
  return { token, expiresInSeconds: readNumber(body, "expires_in") ?? GCLOUD_TOKEN_LIFETIME_SECONDS };
}

async function fetchMetadataProjectId(): Promise<string> {
  const res = await fetch(METADATA_PROJECT_URL, { headers: { "Metadata-Flavor": "Google" } });
  if (!res.ok) throw new Error(`Metadata server project request failed (HTTP ${res.status})`);
  return (await res.text()).trim();
}

// =============================================================================
// GcpCredentialsManager
// =============================================================================

export class GcpCredentialsManager {
  private projectId: string;
  private readonly method: GcpCredentialMethod;
  private readonly retryOptions: GcpRetryOptions;
  private readonly runCommand: CommandRunner;
  private readonly cache: CredentialCache;

  constructor(options: GcpCredentialsManagerOptions = {}) {
    this.projectId = options.projectId ?? "";
    this.method = options.credentialMethod ?? "gcloud-cli";
    this.retryOptions = options.retry ?? {};
    this.runCommand = options.runCommand ?? defaultRunCommand;
    this.cache = new CredentialCache(options.now ?? Date.now);
  }

  /**
   * Resolve the project ID, discovering it from gcloud's active
   * configuration or the metadata server when none was configured.
   */
  async resolveProjectId(): Promise<string> {
    if (this.projectId) return this.projectId;

    const discovered =
      this.method === "gcloud-cli"
        ? (await this.runCommand("gcloud", ["config", "get-value", "project"])).trim()
        : await withGcpRetry(fetchMetadataProjectId, this.retryOptions);

    if (!discovered || discovered === "(unset)") {
      throw new Error("No GCP project configured; set projectId or run `gcloud config set project`");
    }
    this.projectId = discovered;
    return discovered;
  }

  async getAccessToken(): Promise<string> {
    const cached = this.cache.get();
    if (cached) return cached;

    const issued = await withGcpRetry(() => this.issueToken(), this.retryOptions);
    this.cache.set(issued.token, issued.expiresInSeconds);
    return issued.token;
  }

  private async issueToken(): Promise<IssuedToken> {
    if (this.method === "workload-identity") return fetchMetadataToken();

    const token = (await this.runCommand("gcloud", ["auth", "print-access-token"])).trim();
    if (!token) throw new Error("gcloud CLI returned empty access token");
    return { token, expiresInSeconds: GCLOUD_TOKEN_LIFETIME_SECONDS };
  }
}

export function createCredentialsManager(options: GcpCredentialsManagerOptions = {}): GcpCredentialsManager {
  return new GcpCredentialsManager(options);
}
