/**
 * GCP Extension: Shared Types
 */

export type GcpRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

/** Supported authentication methods. */
export type GcpCredentialMethod = "gcloud-cli" | "workload-identity";

/** Resolves an OAuth2 access token for each API call. */
export type AccessTokenProvider = () => Promise<string>;

/** Untyped JSON object as returned by the GCP REST APIs. */
export type JsonObject = Record<string, unknown>;
