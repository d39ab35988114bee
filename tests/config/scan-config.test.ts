import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  configFromEnv,
  loadScanConfig,
  resolveScanConfig,
} from "../../src/config/index.js";
import { ConfigurationError } from "../../src/errors.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "hardencheck-config-"));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe("scan configuration", () => {
  it("falls back to defaults", () => {
    expect(resolveScanConfig([])).toEqual({
      profile: "full",
      root: "/",
      exclude: [],
      includeOnly: [],
      fix: false,
      timeoutSeconds: 300,
      scanTimeoutSeconds: 3600,
      concurrency: 1,
      format: "text",
      out: undefined,
      profilesDir: undefined,
      logLevel: "info",
    });
  });

  it("applies file, environment and flags in precedence order", async () => {
    const configPath = path.join(tempDir, "hardencheck.yaml");
    await fs.writeFile(
      configPath,
      [
        "profile: ssh",
        "timeout: 30",
        "format: json",
        "exclude: [SSH-005, SSH-007]",
        "",
      ].join("\n"),
      "utf8",
    );

    const config = await loadScanConfig({
      configPath,
      env: { HARDENCHECK_PROFILE: "system", HARDENCHECK_TIMEOUT: "45" },
      cli: { profile: "cis", include_only: "FS-001, FS-003" },
    });

    expect(config.profile).toBe("cis");
    expect(config.timeoutSeconds).toBe(45);
    expect(config.format).toBe("json");
    expect(config.exclude).toEqual(["SSH-005", "SSH-007"]);
    expect(config.includeOnly).toEqual(["FS-001", "FS-003"]);
  });

  it("ignores flags that were not given", () => {
    const config = resolveScanConfig([
      { profile: "ssh" },
      { profile: undefined, fix: undefined },
    ]);
    expect(config.profile).toBe("ssh");
    expect(config.fix).toBe(false);
  });

  it("reads only the documented environment variables", () => {
    expect(
      configFromEnv({
        HARDENCHECK_ROOT: "/mnt/image",
        HARDENCHECK_LOG_LEVEL: "debug",
        HARDENCHECK_PROFILE: "",
        HOME: "/root",
      }),
    ).toEqual({ root: "/mnt/image", log_level: "debug" });
  });

  it("resolves paths", () => {
    const config = resolveScanConfig([{ root: "relative/root", out: "r.json" }]);
    expect(config.root).toBe(path.resolve("relative/root"));
    expect(config.out).toBe(path.resolve("r.json"));
  });

  it("collects every invalid value into one error", () => {
    const resolve = () =>
      resolveScanConfig([
        {
          timeout: -1,
          concurrency: "two",
          format: "pdf",
          fix: "yes",
          colour: true,
        },
      ]);
    expect(resolve).toThrow(ConfigurationError);
    expect(resolve).toThrow(
      "Invalid configuration: unknown setting 'colour'; fix must be true or false; timeout must be a non-negative integer; concurrency must be a non-negative integer; format must be one of text, json, csv, html, xml",
    );
  });

  it("rejects timeouts setTimeout cannot hold", () => {
    expect(() =>
      resolveScanConfig([{ timeout: "3000000", scan_timeout: 2_147_484 }]),
    ).toThrow(
      "Invalid configuration: timeout must be at most 2147483 seconds; scan_timeout must be at most 2147483 seconds",
    );
    expect(
      resolveScanConfig([{ timeout: 2_147_483 }]).timeoutSeconds,
    ).toBe(2_147_483);
  });

  it("rejects zero concurrency", () => {
    expect(() => resolveScanConfig([{ concurrency: 0 }])).toThrow(
      "Invalid configuration: concurrency must be at least 1",
    );
  });

  it("reports unreadable and malformed config files", async () => {
    const missing = path.join(tempDir, "missing.yaml");
    await expect(loadScanConfig({ configPath: missing, env: {} })).rejects.toThrow(
      `Unable to read config file ${missing}`,
    );

    const listFile = path.join(tempDir, "list.yaml");
    await fs.writeFile(listFile, "- profile\n", "utf8");
    await expect(loadScanConfig({ configPath: listFile, env: {} })).rejects.toThrow(
      `Invalid config file ${listFile}: expected a mapping of settings`,
    );
  });
});
