import { fail, pass, probeError, warn } from "../checks/probe-result.js";
import type {
  Probe,
  ProbeResult,
  RemediationAction,
  ScanContext,
} from "../checks/types.js";
import { parseSshdConfig, setSshdOption } from "./sshd-config.js";
import { readSystemFile, writeSystemFile } from "./system-reader.js";

export const SSHD_CONFIG_PATH = "/etc/ssh/sshd_config";

export type Verdict = "pass" | "warn" | "fail";

export interface SshdOptionRule {
  readonly keyword: string;
  /** Lowercase values that pass. */
  readonly accepted: readonly string[];
  readonly whenUnset: Verdict;
  readonly unsetNote?: string;
  readonly mismatch?: "warn" | "fail";
  /** Replaces the accepted-list comparison when present. */
  readonly evaluate?: (value: string) => ProbeResult;
}

export function createSshdOptionProbe(rule: SshdOptionRule): Probe {
  return async (context) => {
    const content = await readSystemFile(context.rootPath, SSHD_CONFIG_PATH);
    if (content === null) {
      return probeError(`${SSHD_CONFIG_PATH} not found`);
    }

    const value = parseSshdConfig(content).get(rule.keyword);
    if (value === undefined) {
      const note = rule.unsetNote ? ` (${rule.unsetNote})` : "";
      return verdictResult(rule.whenUnset, `${rule.keyword} not set${note}`);
    }
    if (rule.evaluate) {
      return rule.evaluate(value);
    }

    const normalized = value.toLowerCase();
    if (rule.accepted.includes(normalized)) {
      return pass(`${rule.keyword} is ${normalized}`);
    }
    return verdictResult(
      rule.mismatch ?? "fail",
      `${rule.keyword} is ${normalized} (expected ${rule.accepted.join(" or ")})`,
    );
  };
}

export function createSshdOptionFix(
  keyword: string,
  value: string,
): RemediationAction {
  return async (context: ScanContext) => {
    const content = await readSystemFile(context.rootPath, SSHD_CONFIG_PATH);
    if (content === null) {
      throw new Error(`${SSHD_CONFIG_PATH} not found`);
    }
    context.signal.throwIfAborted();
    await writeSystemFile(
      context.rootPath,
      SSHD_CONFIG_PATH,
      setSshdOption(content, keyword, value),
    );
    context.logger.debug(`Set '${keyword} ${value}' in ${SSHD_CONFIG_PATH}`);
  };
}

function verdictResult(verdict: Verdict, message: string): ProbeResult {
  switch (verdict) {
    case "pass":
      return pass(message);
    case "warn":
      return warn(message);
    default:
      return fail(message);
  }
}
