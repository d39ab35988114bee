import { Category } from "../checks/types.js";
import type { CheckDefinition, Remediation } from "../checks/types.js";
import {
  createFileModeFix,
  createFileModeProbe,
} from "../probes/file-mode-probe.js";
import {
  createSshdOptionFix,
  createSshdOptionProbe,
} from "../probes/sshd-option-probe.js";
import type { CustomCheckConfig } from "./types.js";

export function createCustomCheck(config: CustomCheckConfig): CheckDefinition {
  switch (config.type) {
    case "file-mode": {
      const rule = { path: config.path, mode: config.mode };
      return {
        ...metadata(config),
        probe: createFileModeProbe(rule),
        remediation: remediation(
          config,
          `Set ${config.path} permissions to ${config.mode}`,
          createFileModeFix(rule),
        ),
      };
    }
    case "sshd-option": {
      const fixValue = config.expected[0] ?? "";
      return {
        ...metadata(config),
        probe: createSshdOptionProbe({
          keyword: config.keyword,
          accepted: config.expected,
          whenUnset: config.when_unset,
          mismatch: config.mismatch,
        }),
        remediation: remediation(
          config,
          `Set '${config.keyword} ${fixValue}' in /etc/ssh/sshd_config`,
          createSshdOptionFix(config.keyword, fixValue),
        ),
      };
    }
  }
}

function metadata(config: CustomCheckConfig) {
  return {
    id: config.id,
    name: config.name,
    category: Category.Custom,
    severity: config.severity,
    reference: config.reference,
  };
}

function remediation(
  config: CustomCheckConfig,
  fallback: string,
  apply: Remediation["apply"],
): Remediation {
  return {
    description: config.remediation ?? fallback,
    apply: config.fix ? apply : undefined,
  };
}
