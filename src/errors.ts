export type ErrorCode =
  | "configuration"
  | "initialization"
  | "probe_execution"
  | "probe_timeout"
  | "remediation"
  | "scan_timeout";

export class HardencheckError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HardencheckError";
    this.code = code;
  }
}

/**
 * Unknown or malformed profile, invalid configuration value. Raised before the
 * scan starts; the run never begins.
 */
export class ConfigurationError extends HardencheckError {
  constructor(message: string, options?: ErrorOptions) {
    super("configuration", message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * The scan target or the profiles directory cannot be used.
 */
export class InitializationError extends HardencheckError {
  constructor(message: string, options?: ErrorOptions) {
    super("initialization", message, options);
    this.name = "InitializationError";
  }
}

export class ProbeExecutionError extends HardencheckError {
  public readonly checkId: string;

  constructor(checkId: string, message: string, options?: ErrorOptions) {
    super("probe_execution", message, options);
    this.name = "ProbeExecutionError";
    this.checkId = checkId;
  }
}

export class ProbeTimeoutError extends HardencheckError {
  public readonly checkId: string;
  public readonly timeoutMs: number;

  constructor(checkId: string, timeoutMs: number) {
    super("probe_timeout", "timed out");
    this.name = "ProbeTimeoutError";
    this.checkId = checkId;
    this.timeoutMs = timeoutMs;
  }
}

export class RemediationError extends HardencheckError {
  public readonly checkId: string;

  constructor(checkId: string, message: string, options?: ErrorOptions) {
    super("remediation", message, options);
    this.name = "RemediationError";
    this.checkId = checkId;
  }
}

export class ScanTimeoutError extends HardencheckError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("scan_timeout", `Scan exceeded ${timeoutMs / 1000}s timeout`);
    this.name = "ScanTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
