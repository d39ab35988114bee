import type { Severity } from "../checks/types.js";
import type { Verdict } from "../probes/sshd-option-probe.js";

interface CustomCheckBase {
  readonly id: string;
  readonly name: string;
  readonly severity: Severity;
  readonly reference?: string;
  readonly remediation?: string;
  /** Whether fix mode may apply the built-in remediation. */
  readonly fix: boolean;
}

export interface FileModeCustomCheck extends CustomCheckBase {
  readonly type: "file-mode";
  readonly path: string;
  readonly mode: string;
}

export interface SshdOptionCustomCheck extends CustomCheckBase {
  readonly type: "sshd-option";
  readonly keyword: string;
  readonly expected: readonly string[];
  readonly when_unset: Verdict;
  readonly mismatch: "warn" | "fail";
}

export type CustomCheckConfig = FileModeCustomCheck | SshdOptionCustomCheck;

export interface ProfileDefinition {
  readonly name: string;
  readonly description?: string;
  readonly checks: readonly string[];
  readonly custom_checks: readonly CustomCheckConfig[];
  /** File the profile was read from. */
  readonly source: string;
}

export interface ProfileSummary {
  readonly name: string;
  readonly description?: string;
  readonly checkCount: number;
}
