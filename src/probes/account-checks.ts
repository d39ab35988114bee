import { fail, pass, probeError, warn } from "../checks/probe-result.js";
import { Category, Severity } from "../checks/types.js";
import type {
  CheckDefinition,
  Probe,
  ProbeResult,
  ScanContext,
} from "../checks/types.js";
import {
  findDuplicates,
  parseGroup,
  parsePasswd,
  parseShadow,
} from "./accounts.js";
import {
  createFileModeFix,
  createFileModeProbe,
  type FileModeRule,
} from "./file-mode-probe.js";
import { readSystemFile } from "./system-reader.js";

const PASSWD_MODE: FileModeRule = { path: "/etc/passwd", mode: "644" };
const SHADOW_MODE: FileModeRule = { path: "/etc/shadow", mode: "600" };
const GROUP_MODE: FileModeRule = { path: "/etc/group", mode: "644" };
const SUDOERS_MODE: FileModeRule = { path: "/etc/sudoers", mode: "440" };

/**
 * Run `evaluate` over the named account databases, or report ERROR when one
 * is missing: the check cannot decide without it.
 */
function withAccountFiles(
  paths: readonly string[],
  evaluate: (contents: readonly string[]) => ProbeResult,
): Probe {
  return async (context: ScanContext) => {
    const contents: string[] = [];
    for (const systemPath of paths) {
      const content = await readSystemFile(context.rootPath, systemPath);
      if (content === null) {
        return probeError(`${systemPath} not found`);
      }
      contents.push(content);
    }
    return evaluate(contents);
  };
}

export const ACCOUNT_CHECKS: readonly CheckDefinition[] = [
  {
    id: "SYS-001",
    name: "/etc/passwd permissions",
    category: Category.Authentication,
    severity: Severity.Critical,
    reference: "CIS 6.1.2",
    probe: createFileModeProbe(PASSWD_MODE),
    remediation: {
      description: "Set /etc/passwd permissions to 644",
      apply: createFileModeFix(PASSWD_MODE),
    },
  },
  {
    id: "SYS-002",
    name: "/etc/shadow permissions",
    category: Category.Authentication,
    severity: Severity.Critical,
    reference: "CIS 6.1.3",
    probe: createFileModeProbe(SHADOW_MODE),
    remediation: {
      description: "Set /etc/shadow permissions to 600",
      apply: createFileModeFix(SHADOW_MODE),
    },
  },
  {
    id: "SYS-003",
    name: "/etc/group permissions",
    category: Category.Authentication,
    severity: Severity.High,
    reference: "CIS 6.1.4",
    probe: createFileModeProbe(GROUP_MODE),
    remediation: {
      description: "Set /etc/group permissions to 644",
      apply: createFileModeFix(GROUP_MODE),
    },
  },
  {
    // No fix action: sudoers is only edited through visudo.
    id: "SYS-004",
    name: "/etc/sudoers permissions",
    category: Category.Authentication,
    severity: Severity.Critical,
    probe: createFileModeProbe(SUDOERS_MODE),
    remediation: {
      description: "Use visudo to edit sudoers file",
    },
  },
  {
    id: "SYS-005",
    name: "Accounts with empty passwords",
    category: Category.Authentication,
    severity: Severity.Critical,
    reference: "CIS 6.2.1",
    probe: withAccountFiles(["/etc/shadow"], ([shadow = ""]) => {
      const empty = parseShadow(shadow)
        .filter((entry) => entry.password === "")
        .map((entry) => entry.name);
      return empty.length === 0
        ? pass("No accounts with empty passwords")
        : fail(`Accounts with empty passwords: ${empty.join(", ")}`);
    }),
    remediation: {
      description: "Lock or set a password for accounts with empty passwords",
    },
  },
  {
    id: "SYS-006",
    name: "Accounts without shadow entries",
    category: Category.Authentication,
    severity: Severity.Medium,
    probe: withAccountFiles(
      ["/etc/passwd", "/etc/shadow"],
      ([passwd = "", shadow = ""]) => {
        const shadowed = new Set(parseShadow(shadow).map((entry) => entry.name));
        const missing = parsePasswd(passwd)
          .map((entry) => entry.name)
          .filter((name) => !shadowed.has(name));
        return missing.length === 0
          ? pass("All accounts have shadow entries")
          : warn(`Accounts without shadow entries: ${missing.join(", ")}`);
      },
    ),
    remediation: {
      description: "Run pwconv to create missing shadow entries",
    },
  },
  {
    id: "SYS-007",
    name: "Root account locked",
    category: Category.Authentication,
    severity: Severity.Medium,
    probe: withAccountFiles(["/etc/shadow"], ([shadow = ""]) => {
      const root = parseShadow(shadow).find((entry) => entry.name === "root");
      const password = root?.password ?? "";
      if (password.startsWith("!") || password === "*") {
        return pass("Root account is locked");
      }
      return warn("Root account has an active password");
    }),
    remediation: {
      description: "Lock the root account with 'passwd -l root' and use sudo",
    },
  },
  {
    id: "SYS-008",
    name: "Duplicate UIDs",
    category: Category.Authentication,
    severity: Severity.High,
    reference: "CIS 6.2.5",
    probe: withAccountFiles(["/etc/passwd"], ([passwd = ""]) => {
      const duplicates = findDuplicates(
        parsePasswd(passwd).map((entry) => entry.uid),
      );
      return duplicates.length === 0
        ? pass("No duplicate UIDs")
        : fail(`Duplicate UIDs: ${duplicates.join(", ")}`);
    }),
    remediation: {
      description: "Assign a unique UID to every account",
    },
  },
  {
    id: "SYS-009",
    name: "Duplicate GIDs",
    category: Category.Authentication,
    severity: Severity.High,
    reference: "CIS 6.2.6",
    probe: withAccountFiles(["/etc/group"], ([group = ""]) => {
      const duplicates = findDuplicates(
        parseGroup(group).map((entry) => entry.gid),
      );
      return duplicates.length === 0
        ? pass("No duplicate GIDs")
        : fail(`Duplicate GIDs: ${duplicates.join(", ")}`);
    }),
    remediation: {
      description: "Assign a unique GID to every group",
    },
  },
];
