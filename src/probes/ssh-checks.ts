import { fail, pass, warn } from "../checks/probe-result.js";
import { Category, Severity } from "../checks/types.js";
import type { CheckDefinition, ProbeResult } from "../checks/types.js";
import {
  createSshdOptionFix,
  createSshdOptionProbe,
} from "./sshd-option-probe.js";

const MAX_AUTH_TRIES_LIMIT = 3;
const MAX_AUTH_TRIES_TOLERATED = 5;

function evaluateMaxAuthTries(value: string): ProbeResult {
  const tries = Number(value);
  if (!Number.isInteger(tries)) {
    return fail(`MaxAuthTries has invalid value '${value}'`);
  }
  if (tries <= MAX_AUTH_TRIES_LIMIT) {
    return pass(`MaxAuthTries is ${tries}`);
  }
  const message = `MaxAuthTries is ${tries} (recommended ${MAX_AUTH_TRIES_LIMIT} or lower)`;
  return tries <= MAX_AUTH_TRIES_TOLERATED ? warn(message) : fail(message);
}

export const SSH_CHECKS: readonly CheckDefinition[] = [
  {
    id: "SSH-001",
    name: "SSH root login disabled",
    category: Category.Services,
    severity: Severity.High,
    reference: "CIS 5.2.10",
    probe: createSshdOptionProbe({
      keyword: "PermitRootLogin",
      accepted: ["no", "prohibit-password", "without-password"],
      whenUnset: "pass",
      unsetNote: "default prohibit-password",
    }),
    remediation: {
      description: "Set 'PermitRootLogin no' in /etc/ssh/sshd_config",
      apply: createSshdOptionFix("PermitRootLogin", "no"),
    },
  },
  {
    id: "SSH-002",
    name: "SSH password authentication disabled",
    category: Category.Services,
    severity: Severity.High,
    probe: createSshdOptionProbe({
      keyword: "PasswordAuthentication",
      accepted: ["no"],
      whenUnset: "fail",
      unsetNote: "default yes",
    }),
    remediation: {
      description: "Set 'PasswordAuthentication no' in /etc/ssh/sshd_config",
      apply: createSshdOptionFix("PasswordAuthentication", "no"),
    },
  },
  {
    id: "SSH-003",
    name: "SSH MaxAuthTries limit",
    category: Category.Services,
    severity: Severity.Medium,
    reference: "CIS 5.2.7",
    probe: createSshdOptionProbe({
      keyword: "MaxAuthTries",
      accepted: [],
      whenUnset: "warn",
      unsetNote: "default 6",
      evaluate: evaluateMaxAuthTries,
    }),
    remediation: {
      description: "Set 'MaxAuthTries 3' in /etc/ssh/sshd_config",
      apply: createSshdOptionFix("MaxAuthTries", String(MAX_AUTH_TRIES_LIMIT)),
    },
  },
  {
    id: "SSH-004",
    name: "SSH protocol version 2 only",
    category: Category.Services,
    severity: Severity.High,
    probe: createSshdOptionProbe({
      keyword: "Protocol",
      accepted: ["2"],
      whenUnset: "pass",
      unsetNote: "default 2",
    }),
    remediation: {
      description: "Ensure SSH uses protocol version 2",
      apply: createSshdOptionFix("Protocol", "2"),
    },
  },
  {
    id: "SSH-005",
    name: "SSH X11 forwarding disabled",
    category: Category.Services,
    severity: Severity.Low,
    reference: "CIS 5.2.12",
    probe: createSshdOptionProbe({
      keyword: "X11Forwarding",
      accepted: ["no"],
      whenUnset: "pass",
      unsetNote: "default no",
      mismatch: "warn",
    }),
    remediation: {
      description: "Set 'X11Forwarding no' in /etc/ssh/sshd_config",
      apply: createSshdOptionFix("X11Forwarding", "no"),
    },
  },
  {
    id: "SSH-006",
    name: "SSH empty passwords not permitted",
    category: Category.Services,
    severity: Severity.High,
    reference: "CIS 5.2.9",
    probe: createSshdOptionProbe({
      keyword: "PermitEmptyPasswords",
      accepted: ["no"],
      whenUnset: "pass",
      unsetNote: "default no",
    }),
    remediation: {
      description: "Set 'PermitEmptyPasswords no' in /etc/ssh/sshd_config",
      apply: createSshdOptionFix("PermitEmptyPasswords", "no"),
    },
  },
  {
    id: "SSH-007",
    name: "SSH PAM enabled",
    category: Category.Services,
    severity: Severity.Medium,
    probe: createSshdOptionProbe({
      keyword: "UsePAM",
      accepted: ["yes"],
      whenUnset: "pass",
      unsetNote: "default yes",
      mismatch: "warn",
    }),
    remediation: {
      description: "Set 'UsePAM yes' in /etc/ssh/sshd_config",
    },
  },
];
