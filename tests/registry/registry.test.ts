import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { pass, fail } from "../../src/checks/probe-result.js";
import { Category, Severity } from "../../src/checks/types.js";
import { ConfigurationError } from "../../src/errors.js";
import {
  loadCheckRegistry,
  loadProfiles,
  validateProfile,
} from "../../src/registry/index.js";
import { putFile, testContext } from "../helpers/system-root.js";

const BUILTIN_PROFILES = fileURLToPath(new URL("../../profiles", import.meta.url));

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "hardencheck-profiles-"));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

async function writeProfile(fileName: string, content: string): Promise<string> {
  const filePath = path.join(tempDir, fileName);
  await fs.writeFile(filePath, content, "utf8");
  return filePath;
}

describe("built-in profiles", () => {
  it("lists profiles sorted by name with check counts", async () => {
    const registry = await loadCheckRegistry({ profilesDir: BUILTIN_PROFILES });
    expect(
      registry.listProfiles().map((profile) => [profile.name, profile.checkCount]),
    ).toEqual([
      ["cis", 16],
      ["filesystem", 7],
      ["full", 23],
      ["ssh", 7],
      ["system", 9],
    ]);
  });

  it("orders checks by category, then declaration order", async () => {
    const registry = await loadCheckRegistry({ profilesDir: BUILTIN_PROFILES });
    expect(registry.listChecks("cis").map((check) => check.id)).toEqual([
      "FS-001",
      "FS-003",
      "FS-005",
      "FS-007",
      "SYS-001",
      "SYS-002",
      "SYS-003",
      "SYS-005",
      "SYS-008",
      "SYS-009",
      "SSH-001",
      "SSH-003",
      "SSH-005",
      "SSH-006",
      "CIS-5.1.2",
      "CIS-5.2.5",
    ]);
  });

  it("returns the same order on every call", async () => {
    const registry = await loadCheckRegistry({ profilesDir: BUILTIN_PROFILES });
    const first = registry.listChecks("full").map((check) => check.id);
    const second = registry.listChecks("full").map((check) => check.id);
    expect(second).toEqual(first);
    expect(first.slice(0, 2)).toEqual(["FS-001", "FS-002"]);
    expect(first.at(-1)).toBe("SSH-007");
  });

  it("rejects an unknown profile", async () => {
    const registry = await loadCheckRegistry({ profilesDir: BUILTIN_PROFILES });
    expect(() => registry.listChecks("nope")).toThrow(ConfigurationError);
    expect(() => registry.listChecks("nope")).toThrow(
      "Unknown profile 'nope'. Available profiles: cis, filesystem, full, ssh, system",
    );
  });

  it("lets an override directory replace a profile", async () => {
    await writeProfile("ssh.yaml", "name: ssh\nchecks: [SSH-002]\n");
    const registry = await loadCheckRegistry({
      profilesDir: BUILTIN_PROFILES,
      overrideDir: tempDir,
    });
    expect(registry.listChecks("ssh").map((check) => check.id)).toEqual([
      "SSH-002",
    ]);
    expect(registry.hasProfile("full")).toBe(true);
  });
});

describe("profile validation", () => {
  it("collects every problem into one message", () => {
    expect(() =>
      validateProfile({ name: "Bad Name", checks: ["x"] }, "bad.yaml"),
    ).toThrow(
      "name must be a lowercase identifier; checks[0] must be a check id; profile must declare at least one check",
    );
  });

  it("rejects duplicate ids and unknown keys", () => {
    expect(() =>
      validateProfile(
        { name: "dup", checks: ["FS-001", "FS-001"], extra: true },
        "dup.yaml",
      ),
    ).toThrow("profile has unknown key 'extra'; duplicate check id FS-001");
  });

  it("normalizes custom checks", () => {
    const profile = validateProfile(
      {
        name: "custom",
        custom_checks: [
          {
            id: "APP-001",
            name: "App config permissions",
            type: "file-mode",
            severity: "high",
            path: "/etc/app.conf",
            mode: 600,
          },
          {
            id: "APP-002",
            name: "SSH log level",
            type: "sshd-option",
            severity: "LOW",
            keyword: "LogLevel",
            expected: ["INFO", "VERBOSE"],
            mismatch: "warn",
            fix: false,
          },
        ],
      },
      "custom.yaml",
    );
    expect(profile.custom_checks).toEqual([
      {
        id: "APP-001",
        name: "App config permissions",
        severity: Severity.High,
        reference: undefined,
        remediation: undefined,
        fix: true,
        type: "file-mode",
        path: "/etc/app.conf",
        mode: "600",
      },
      {
        id: "APP-002",
        name: "SSH log level",
        severity: Severity.Low,
        reference: undefined,
        remediation: undefined,
        fix: false,
        type: "sshd-option",
        keyword: "LogLevel",
        expected: ["info", "verbose"],
        when_unset: "fail",
        mismatch: "warn",
      },
    ]);
  });

  it("rejects malformed custom checks", () => {
    expect(() =>
      validateProfile(
        {
          name: "custom",
          custom_checks: [
            {
              id: "APP-001",
              name: "Bad",
              type: "file-mode",
              severity: "urgent",
              path: "etc/app.conf",
              mode: "999",
            },
          ],
        },
        "custom.yaml",
      ),
    ).toThrow(
      'custom_checks[0].severity must be one of CRITICAL, HIGH, MEDIUM, LOW, INFO; custom_checks[0].path must be absolute; custom_checks[0].mode must be an octal mode such as "644"; profile must declare at least one check',
    );
  });
});

describe("profile loading", () => {
  it("wraps YAML errors in a ConfigurationError", async () => {
    const filePath = await writeProfile("broken.yaml", "name: [unclosed\n");
    await expect(loadProfiles(tempDir)).rejects.toThrow(
      `Invalid profile ${filePath}:`,
    );
    await expect(loadProfiles(tempDir)).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it("rejects the same profile name in two files", async () => {
    await writeProfile("a.yaml", "name: base\nchecks: [FS-001]\n");
    await writeProfile("b.yml", "name: base\nchecks: [FS-002]\n");
    await expect(loadProfiles(tempDir)).rejects.toThrow(
      `Profile 'base' is defined in both ${path.join(tempDir, "a.yaml")} and ${path.join(tempDir, "b.yml")}`,
    );
  });

  it("rejects unknown check ids when the registry is built", async () => {
    const filePath = await writeProfile(
      "typo.yaml",
      "name: typo\nchecks: [FS-001, FS-999]\n",
    );
    await expect(loadCheckRegistry({ profilesDir: tempDir })).rejects.toThrow(
      `Invalid profile ${filePath}: unknown check ids FS-999`,
    );
  });

  it("rejects custom checks that reuse a built-in id", async () => {
    const filePath = await writeProfile(
      "shadow.yaml",
      [
        "name: shadowing",
        "custom_checks:",
        "  - id: FS-001",
        "    name: Not allowed",
        "    type: file-mode",
        "    severity: LOW",
        "    path: /etc/motd",
        '    mode: "644"',
        "",
      ].join("\n"),
    );
    await expect(loadCheckRegistry({ profilesDir: tempDir })).rejects.toThrow(
      `Invalid profile ${filePath}: custom check FS-001 shadows a built-in check`,
    );
  });

  it("builds runnable custom checks", async () => {
    await writeProfile(
      "app.yaml",
      [
        "name: app",
        "checks: [SSH-001]",
        "custom_checks:",
        "  - id: APP-001",
        "    name: App config permissions",
        "    type: file-mode",
        "    severity: HIGH",
        "    path: /etc/app.conf",
        "    mode: 600",
        "",
      ].join("\n"),
    );
    const registry = await loadCheckRegistry({ profilesDir: tempDir });
    const checks = registry.listChecks("app");
    expect(checks.map((check) => [check.id, check.category])).toEqual([
      ["SSH-001", Category.Services],
      ["APP-001", Category.Custom],
    ]);

    const custom = checks[1];
    expect(custom?.remediation?.description).toBe(
      "Set /etc/app.conf permissions to 600",
    );
    const root = path.join(tempDir, "root");
    await putFile(root, "/etc/app.conf", "key=value\n", 0o644);
    expect(await custom?.probe(testContext(root))).toEqual(
      fail("/etc/app.conf has mode 644 (expected 600)"),
    );
    await custom?.remediation?.apply?.(testContext(root, { fixMode: true }));
    expect(await custom?.probe(testContext(root))).toEqual(
      pass("/etc/app.conf has mode 600"),
    );
  });
});
