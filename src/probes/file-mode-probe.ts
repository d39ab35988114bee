import { fail, pass, probeError } from "../checks/probe-result.js";
import type { Probe, RemediationAction } from "../checks/types.js";
import { chmodSystemPath, statSystemPath } from "./system-reader.js";

export interface FileModeRule {
  readonly path: string;
  /** Expected permission bits in octal, e.g. "644". */
  readonly mode: string;
  /** Outcome when the file does not exist. */
  readonly whenMissing?: "fail" | "error";
}

export function createFileModeProbe(rule: FileModeRule): Probe {
  return async (context) => {
    const status = await statSystemPath(context.rootPath, rule.path);
    if (!status) {
      const message = `${rule.path} not found`;
      return rule.whenMissing === "error" ? probeError(message) : fail(message);
    }
    if (status.mode === rule.mode) {
      return pass(`${rule.path} has mode ${status.mode}`);
    }
    return fail(
      `${rule.path} has mode ${status.mode} (expected ${rule.mode})`,
    );
  };
}

export function createFileModeFix(rule: FileModeRule): RemediationAction {
  return async (context) => {
    context.signal.throwIfAborted();
    await chmodSystemPath(context.rootPath, rule.path, parseInt(rule.mode, 8));
    context.logger.debug(`Set ${rule.path} to mode ${rule.mode}`);
  };
}
