import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import {
  DEFAULT_CHECK_TIMEOUT_SECONDS,
  DEFAULT_SCAN_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
} from "../engine/scan-engine.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { isLogLevel, type LogLevel } from "../logging/logger.js";
import { REPORT_FORMATS, type ReportFormat } from "../report/types.js";

export interface ScanConfig {
  readonly profile: string;
  readonly root: string;
  readonly exclude: readonly string[];
  readonly includeOnly: readonly string[];
  readonly fix: boolean;
  readonly timeoutSeconds: number;
  readonly scanTimeoutSeconds: number;
  readonly concurrency: number;
  readonly format: ReportFormat;
  readonly out?: string;
  readonly profilesDir?: string;
  readonly logLevel: LogLevel;
}

/**
 * One configuration source, keyed the way the YAML file spells its fields.
 * Values are unvalidated; undefined means "not set by this source".
 */
export type RawConfig = Readonly<Record<string, unknown>>;

export const CONFIG_KEYS = [
  "profile",
  "root",
  "exclude",
  "include_only",
  "fix",
  "timeout",
  "scan_timeout",
  "concurrency",
  "format",
  "out",
  "profiles_dir",
  "log_level",
] as const;

const CONFIG_KEY_SET = new Set<string>(CONFIG_KEYS);

export const DEFAULT_CONFIG: RawConfig = {
  profile: "full",
  root: "/",
  exclude: [],
  include_only: [],
  fix: false,
  timeout: DEFAULT_CHECK_TIMEOUT_SECONDS,
  scan_timeout: DEFAULT_SCAN_TIMEOUT_SECONDS,
  concurrency: 1,
  format: "text",
  log_level: "info",
};

const ENV_KEYS: Readonly<Record<string, (typeof CONFIG_KEYS)[number]>> = {
  HARDENCHECK_PROFILE: "profile",
  HARDENCHECK_TIMEOUT: "timeout",
  HARDENCHECK_LOG_LEVEL: "log_level",
  HARDENCHECK_ROOT: "root",
};

const PROFILE_NAME = /^[a-z0-9][a-z0-9_-]*$/;

export interface LoadConfigOptions {
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly cli?: RawConfig;
}

/**
 * Defaults, then the YAML file, then the environment, then CLI flags.
 */
export async function loadScanConfig(
  options: LoadConfigOptions = {},
): Promise<ScanConfig> {
  const file = options.configPath
    ? await loadConfigFile(options.configPath)
    : {};
  return resolveScanConfig([
    file,
    configFromEnv(options.env ?? process.env),
    options.cli ?? {},
  ]);
}

export async function loadConfigFile(configPath: string): Promise<RawConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read config file ${configPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}: expected a mapping of settings`,
    );
  }
  return parsed;
}

export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const config: Record<string, unknown> = {};
  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== "") {
      config[key] = value;
    }
  }
  return config;
}

/**
 * Merge sources over the defaults, lowest precedence first, and validate the
 * result. Every problem is reported in one ConfigurationError.
 */
export function resolveScanConfig(sources: readonly RawConfig[]): ScanConfig {
  const errors: string[] = [];
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (!CONFIG_KEY_SET.has(key)) {
        errors.push(`unknown setting '${key}'`);
        continue;
      }
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  const profile = merged.profile;
  if (typeof profile !== "string" || !PROFILE_NAME.test(profile)) {
    errors.push("profile must be a lowercase profile name");
  }
  const root = parsePath(merged.root, "root", errors) ?? "/";
  const exclude = parseIdList(merged.exclude, "exclude", errors);
  const includeOnly = parseIdList(merged.include_only, "include_only", errors);
  const fix = parseBoolean(merged.fix, "fix", errors);
  const timeoutSeconds = parseTimeout(merged.timeout, "timeout", errors);
  const scanTimeoutSeconds = parseTimeout(
    merged.scan_timeout,
    "scan_timeout",
    errors,
  );
  const concurrency =
    parseCount(merged.concurrency, "concurrency", errors) ?? 1;
  if (concurrency === 0) {
    errors.push("concurrency must be at least 1");
  }
  const format = REPORT_FORMATS.find((candidate) => candidate === merged.format);
  if (!format) {
    errors.push(`format must be one of ${REPORT_FORMATS.join(", ")}`);
  }
  const out = parsePath(merged.out, "out", errors);
  const profilesDir = parsePath(merged.profiles_dir, "profiles_dir", errors);
  const logLevel = merged.log_level;
  if (typeof logLevel !== "string" || !isLogLevel(logLevel)) {
    errors.push("log_level must be one of error, warn, info, debug");
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${errors.join("; ")}`);
  }

  return {
    profile: typeof profile === "string" ? profile : "",
    root,
    exclude,
    includeOnly,
    fix,
    timeoutSeconds,
    scanTimeoutSeconds,
    concurrency,
    format: format ?? "text",
    out,
    profilesDir,
    logLevel:
      typeof logLevel === "string" && isLogLevel(logLevel) ? logLevel : "info",
  };
}

function parseIdList(input: unknown, label: string, errors: string[]): string[] {
  const values = typeof input === "string" ? input.split(",") : input;
  if (!Array.isArray(values)) {
    errors.push(`${label} must be a list or a comma-separated string`);
    return [];
  }
  const ids: string[] = [];
  values.forEach((value: unknown, index) => {
    if (typeof value !== "string") {
      errors.push(`${label}[${index}] must be a string`);
      return;
    }
    const id = value.trim();
    if (id !== "") {
      ids.push(id);
    }
  });
  return ids;
}

function parseBoolean(input: unknown, label: string, errors: string[]): boolean {
  if (typeof input === "boolean") {
    return input;
  }
  if (input === "true") {
    return true;
  }
  if (input === "false") {
    return false;
  }
  errors.push(`${label} must be true or false`);
  return false;
}

function parseCount(
  input: unknown,
  label: string,
  errors: string[],
): number | undefined {
  const value =
    typeof input === "string" && /^\d+$/.test(input.trim())
      ? Number(input.trim())
      : input;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    errors.push(`${label} must be a non-negative integer`);
    return undefined;
  }
  return value;
}

function parseTimeout(input: unknown, label: string, errors: string[]): number {
  const seconds = parseCount(input, label, errors) ?? 0;
  if (seconds > MAX_TIMEOUT_SECONDS) {
    errors.push(`${label} must be at most ${MAX_TIMEOUT_SECONDS} seconds`);
    return 0;
  }
  return seconds;
}

function parsePath(
  input: unknown,
  label: string,
  errors: string[],
): string | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "string" || input.trim() === "") {
    errors.push(`${label} must be a non-empty path`);
    return undefined;
  }
  return path.resolve(input);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
