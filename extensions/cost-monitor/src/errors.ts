/**
 * Cost monitor error taxonomy.
 */

export type CostMonitorErrorCode =
  | "NOT_FOUND"
  | "UNREACHABLE"
  | "INVALID_CONFIGURATION"
  | "DELIVERY_FAILURE"
  | "CORRUPT_STATE"
  | "INVALID_ARGUMENT";

export class CostMonitorError extends Error {
  constructor(
    message: string,
    public readonly code: CostMonitorErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CostMonitorError";
  }
}

/** A named resource is absent from the inventory. */
export class NotFoundError extends CostMonitorError {
  constructor(
    public readonly resource: string,
    options?: { cause?: unknown },
  ) {
    super(`Resource not found: ${resource}`, "NOT_FOUND", options);
    this.name = "NotFoundError";
  }
}

/** An API call or remote execution failed. */
export class UnreachableError extends CostMonitorError {
  constructor(
    public readonly resource: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${resource} unreachable: ${detail}`, "UNREACHABLE", options);
    this.name = "UnreachableError";
  }
}

/** Fatal before any billing calculation; the CLI exits with status 2. */
export class InvalidConfigurationError extends CostMonitorError {
  readonly exitCode = 2;

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message, "INVALID_CONFIGURATION");
    this.name = "InvalidConfigurationError";
  }
}

/** The webhook did not acknowledge a message. */
export class DeliveryFailureError extends CostMonitorError {
  constructor(
    message: string,
    public readonly response?: string,
  ) {
    super(message, "DELIVERY_FAILURE");
    this.name = "DeliveryFailureError";
  }
}

export class CorruptStateError extends CostMonitorError {
  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(message, "CORRUPT_STATE");
    this.name = "CorruptStateError";
  }
}

export class InvalidArgumentError extends CostMonitorError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
