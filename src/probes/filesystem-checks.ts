import { fail, pass, probeError, warn } from "../checks/probe-result.js";
import { Category, Severity } from "../checks/types.js";
import type { CheckDefinition, ScanContext } from "../checks/types.js";
import { parseGroup, parsePasswd } from "./accounts.js";
import { createFileModeFix, type FileModeRule } from "./file-mode-probe.js";
import {
  chmodSystemPath,
  DEFAULT_WALK_EXCLUDES,
  readSystemFile,
  statSystemPath,
  walkSystemTree,
  type TreeEntry,
} from "./system-reader.js";

const PSEUDO_FS_EXCLUDES = ["/proc", "/sys", "/dev"] as const;

const WORLD_WRITABLE = 0o002;
const STICKY = 0o1000;
const SETUID = 0o4000;
const SETGID = 0o2000;

const SPECIAL_BINARY_WARN_THRESHOLD = 20;
const SPECIAL_BINARY_FAIL_THRESHOLD = 50;

const CRITICAL_FILE_MODES: readonly FileModeRule[] = [
  { path: "/etc/passwd", mode: "644" },
  { path: "/etc/shadow", mode: "600" },
  { path: "/etc/group", mode: "644" },
];

async function collectEntries(
  context: ScanContext,
  predicate: (entry: TreeEntry) => boolean,
  excludes: readonly string[] = DEFAULT_WALK_EXCLUDES,
): Promise<TreeEntry[]> {
  const matches: TreeEntry[] = [];
  await walkSystemTree(
    context.rootPath,
    (entry) => {
      if (predicate(entry)) {
        matches.push(entry);
      }
    },
    { excludes, signal: context.signal },
  );
  return matches;
}

function isWorldWritable(type: TreeEntry["type"]) {
  return (entry: TreeEntry): boolean =>
    entry.type === type && (entry.permissions & WORLD_WRITABLE) !== 0;
}

function isUnstickyWorldWritableDir(entry: TreeEntry): boolean {
  return (
    entry.type === "directory" &&
    (entry.permissions & WORLD_WRITABLE) !== 0 &&
    (entry.permissions & STICKY) === 0
  );
}

async function removeWorldWrite(
  context: ScanContext,
  type: TreeEntry["type"],
): Promise<void> {
  const entries = await collectEntries(context, isWorldWritable(type));
  for (const entry of entries) {
    context.signal.throwIfAborted();
    await chmodSystemPath(
      context.rootPath,
      entry.systemPath,
      entry.permissions & ~WORLD_WRITABLE,
    );
  }
  context.logger.debug(
    `Removed world-write permission from ${entries.length} ${type} entries`,
  );
}

function describeCount(count: number, noun: string, sample: readonly TreeEntry[]) {
  const preview = sample
    .slice(0, 3)
    .map((entry) => entry.systemPath)
    .join(", ");
  const more = count > 3 ? ", ..." : "";
  return `Found ${count} ${noun}: ${preview}${more}`;
}

export const FILESYSTEM_CHECKS: readonly CheckDefinition[] = [
  {
    id: "FS-001",
    name: "World-writable files check",
    category: Category.FileSystem,
    severity: Severity.High,
    reference: "CIS 6.1.10",
    probe: async (context) => {
      const found = await collectEntries(context, isWorldWritable("file"));
      return found.length === 0
        ? pass("No world-writable files found")
        : fail(describeCount(found.length, "world-writable files", found));
    },
    remediation: {
      description: "Remove world-write permissions or review file necessity",
      apply: (context) => removeWorldWrite(context, "file"),
    },
  },
  {
    id: "FS-002",
    name: "World-writable directories check",
    category: Category.FileSystem,
    severity: Severity.High,
    probe: async (context) => {
      const found = await collectEntries(context, isWorldWritable("directory"));
      return found.length === 0
        ? pass("No world-writable directories found")
        : fail(describeCount(found.length, "world-writable directories", found));
    },
    remediation: {
      description: "Remove world-write permissions from directories",
      apply: (context) => removeWorldWrite(context, "directory"),
    },
  },
  {
    id: "FS-003",
    name: "SUID/SGID binaries check",
    category: Category.FileSystem,
    severity: Severity.Medium,
    reference: "CIS 6.1.13",
    probe: async (context) => {
      let setuid = 0;
      let setgid = 0;
      await walkSystemTree(
        context.rootPath,
        (entry) => {
          if (entry.type !== "file") {
            return;
          }
          if ((entry.permissions & SETUID) !== 0) {
            setuid += 1;
          }
          if ((entry.permissions & SETGID) !== 0) {
            setgid += 1;
          }
        },
        { excludes: PSEUDO_FS_EXCLUDES, signal: context.signal },
      );
      const total = setuid + setgid;
      const message = `Found ${setuid} SUID and ${setgid} SGID files`;
      if (total > SPECIAL_BINARY_FAIL_THRESHOLD) {
        return fail(message);
      }
      if (total > SPECIAL_BINARY_WARN_THRESHOLD) {
        return warn(message);
      }
      return pass(message);
    },
    remediation: {
      description: "Review SUID/SGID binaries for necessity and security",
    },
  },
  {
    id: "FS-004",
    name: "Critical file permissions",
    category: Category.FileSystem,
    severity: Severity.Critical,
    probe: async (context) => {
      const issues: string[] = [];
      for (const rule of CRITICAL_FILE_MODES) {
        const status = await statSystemPath(context.rootPath, rule.path);
        if (status && status.mode !== rule.mode) {
          issues.push(`${rule.path} is ${status.mode} (expected ${rule.mode})`);
        }
      }
      return issues.length === 0
        ? pass("Critical files have expected permissions")
        : fail(issues.join("; "));
    },
    remediation: {
      description: "Set proper permissions on critical system files",
      apply: async (context) => {
        for (const rule of CRITICAL_FILE_MODES) {
          const status = await statSystemPath(context.rootPath, rule.path);
          if (status && status.mode !== rule.mode) {
            await createFileModeFix(rule)(context);
          }
        }
      },
    },
  },
  {
    id: "FS-005",
    name: "Unowned files check",
    category: Category.FileSystem,
    severity: Severity.Medium,
    reference: "CIS 6.1.11",
    probe: async (context) => {
      const passwd = await readSystemFile(context.rootPath, "/etc/passwd");
      const group = await readSystemFile(context.rootPath, "/etc/group");
      if (passwd === null || group === null) {
        return probeError(
          "Cannot resolve owners: /etc/passwd or /etc/group not found",
        );
      }
      const uids = new Set(parsePasswd(passwd).map((entry) => entry.uid));
      const gids = new Set(parseGroup(group).map((entry) => entry.gid));
      const found = await collectEntries(
        context,
        (entry) => !uids.has(entry.uid) || !gids.has(entry.gid),
        PSEUDO_FS_EXCLUDES,
      );
      return found.length === 0
        ? pass("No unowned files found")
        : warn(describeCount(found.length, "unowned files", found));
    },
    remediation: {
      description: "Assign ownership to unowned files or remove them",
    },
  },
  {
    id: "FS-006",
    name: "/tmp permissions",
    category: Category.FileSystem,
    severity: Severity.Medium,
    probe: async (context) => {
      const status = await statSystemPath(context.rootPath, "/tmp");
      if (!status || !status.isDirectory) {
        return fail("/tmp directory not found");
      }
      return status.mode === "1777"
        ? pass("/tmp has mode 1777")
        : fail(`/tmp has mode ${status.mode} (expected 1777)`);
    },
    remediation: {
      description: "Set /tmp permissions to 1777",
      apply: createFileModeFix({ path: "/tmp", mode: "1777" }),
    },
  },
  {
    id: "FS-007",
    name: "Sticky bit on world-writable directories",
    category: Category.FileSystem,
    severity: Severity.Medium,
    reference: "CIS 1.1.21",
    probe: async (context) => {
      const found = await collectEntries(
        context,
        isUnstickyWorldWritableDir,
        PSEUDO_FS_EXCLUDES,
      );
      return found.length === 0
        ? pass("All world-writable directories have the sticky bit")
        : fail(
            describeCount(
              found.length,
              "world-writable directories without sticky bit",
              found,
            ),
          );
    },
    remediation: {
      description: "Set the sticky bit on world-writable directories",
      apply: async (context) => {
        const found = await collectEntries(
          context,
          isUnstickyWorldWritableDir,
          PSEUDO_FS_EXCLUDES,
        );
        for (const entry of found) {
          context.signal.throwIfAborted();
          await chmodSystemPath(
            context.rootPath,
            entry.systemPath,
            entry.permissions | STICKY,
          );
        }
        context.logger.debug(`Set sticky bit on ${found.length} directories`);
      },
    },
  },
];
