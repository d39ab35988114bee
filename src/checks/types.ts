import type { Logger } from "../logging/logger.js";

/**
 * Declaration order is the registry's category order.
 */
export const enum Category {
  FileSystem = "filesystem",
  Authentication = "authentication",
  Networking = "networking",
  Services = "services",
  Kernel = "kernel",
  Logging = "logging",
  Custom = "custom",
}

export const CATEGORY_ORDER: readonly Category[] = [
  Category.FileSystem,
  Category.Authentication,
  Category.Networking,
  Category.Services,
  Category.Kernel,
  Category.Logging,
  Category.Custom,
];

export const enum Severity {
  Critical = "CRITICAL",
  High = "HIGH",
  Medium = "MEDIUM",
  Low = "LOW",
  Info = "INFO",
}

export const SEVERITIES: readonly Severity[] = [
  Severity.Critical,
  Severity.High,
  Severity.Medium,
  Severity.Low,
  Severity.Info,
];

export type FailureDegree = "hard" | "soft";

export type ProbeResult =
  | { readonly kind: "success"; readonly message: string }
  | {
      readonly kind: "failure";
      readonly degree: FailureDegree;
      readonly message: string;
    }
  | { readonly kind: "error"; readonly message: string };

/**
 * Everything a probe may touch. One context per check invocation; nothing in
 * it outlives the scan run that created it.
 */
export interface ScanContext {
  readonly scanId: string;
  readonly rootPath: string;
  readonly fixMode: boolean;
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

export type Probe = (context: ScanContext) => Promise<ProbeResult>;

export type RemediationAction = (context: ScanContext) => Promise<void>;

export interface Remediation {
  readonly description: string;
  readonly apply?: RemediationAction;
}

export interface CheckDefinition {
  readonly id: string;
  readonly name: string;
  readonly category: Category;
  readonly severity: Severity;
  readonly reference?: string;
  readonly probe: Probe;
  readonly remediation?: Remediation;
}
