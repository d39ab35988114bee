import { SEVERITIES, Severity } from "../checks/types.js";
import type { Verdict } from "../probes/sshd-option-probe.js";
import type {
  CustomCheckConfig,
  FileModeCustomCheck,
  ProfileDefinition,
  SshdOptionCustomCheck,
} from "./types.js";

const PROFILE_KEYS = new Set(["name", "description", "checks", "custom_checks"]);
const CUSTOM_BASE_KEYS = [
  "id",
  "name",
  "severity",
  "reference",
  "remediation",
  "fix",
  "type",
] as const;
const FILE_MODE_KEYS = new Set<string>([...CUSTOM_BASE_KEYS, "path", "mode"]);
const SSHD_OPTION_KEYS = new Set<string>([
  ...CUSTOM_BASE_KEYS,
  "keyword",
  "expected",
  "when_unset",
  "mismatch",
]);

const PROFILE_NAME = /^[a-z0-9][a-z0-9_-]*$/;
const CHECK_ID = /^[A-Z][A-Z0-9]*-[A-Z0-9.-]+$/;
const OCTAL_MODE = /^[0-7]{3,4}$/;
const SSHD_KEYWORD = /^[A-Za-z][A-Za-z0-9]*$/;
const VERDICTS = new Set<string>(["pass", "warn", "fail"]);

/**
 * Validate a parsed profile document. All problems are collected and thrown
 * together as one message.
 */
export function validateProfile(
  input: unknown,
  source: string,
): ProfileDefinition {
  const errors: string[] = [];
  const profile = parseProfile(input, source, errors);
  if (errors.length > 0) {
    throw new Error(errors.join("; "));
  }
  return profile;
}

function parseProfile(
  input: unknown,
  source: string,
  errors: string[],
): ProfileDefinition {
  if (!isRecord(input)) {
    errors.push("profile must be an object");
    return { name: "", checks: [], custom_checks: [], source };
  }
  assertNoExtraKeys(input, PROFILE_KEYS, "profile", errors);

  const name = input.name;
  if (typeof name !== "string" || !PROFILE_NAME.test(name)) {
    errors.push("name must be a lowercase identifier");
  }

  const description = input.description;
  if (description !== undefined && typeof description !== "string") {
    errors.push("description must be a string");
  }

  const checks = parseCheckIds(input.checks, errors);
  const customChecks = parseCustomChecks(input.custom_checks, errors);
  if (checks.length === 0 && customChecks.length === 0) {
    errors.push("profile must declare at least one check");
  }

  const seen = new Set<string>();
  for (const id of [...checks, ...customChecks.map((check) => check.id)]) {
    if (seen.has(id)) {
      errors.push(`duplicate check id ${id}`);
    }
    seen.add(id);
  }

  return {
    name: typeof name === "string" ? name : "",
    description: typeof description === "string" ? description : undefined,
    checks,
    custom_checks: customChecks,
    source,
  };
}

function parseCheckIds(input: unknown, errors: string[]): string[] {
  if (input === undefined) {
    return [];
  }
  if (!Array.isArray(input)) {
    errors.push("checks must be a list of check ids");
    return [];
  }
  const ids: string[] = [];
  input.forEach((value: unknown, index) => {
    if (typeof value !== "string" || !CHECK_ID.test(value)) {
      errors.push(`checks[${index}] must be a check id`);
      return;
    }
    ids.push(value);
  });
  return ids;
}

function parseCustomChecks(input: unknown, errors: string[]): CustomCheckConfig[] {
  if (input === undefined) {
    return [];
  }
  if (!Array.isArray(input)) {
    errors.push("custom_checks must be a list");
    return [];
  }
  const configs: CustomCheckConfig[] = [];
  input.forEach((value: unknown, index) => {
    const config = parseCustomCheck(value, `custom_checks[${index}]`, errors);
    if (config) {
      configs.push(config);
    }
  });
  return configs;
}

function parseCustomCheck(
  input: unknown,
  label: string,
  errors: string[],
): CustomCheckConfig | null {
  if (!isRecord(input)) {
    errors.push(`${label} must be an object`);
    return null;
  }

  const startErrors = errors.length;
  const id = input.id;
  if (typeof id !== "string" || !CHECK_ID.test(id)) {
    errors.push(`${label}.id must be a check id`);
  }
  const name = requireString(input.name, `${label}.name`, errors);
  const severity = parseSeverity(input.severity, `${label}.severity`, errors);
  const reference = optionalString(input.reference, `${label}.reference`, errors);
  const remediation = optionalString(
    input.remediation,
    `${label}.remediation`,
    errors,
  );
  const fix = input.fix ?? true;
  if (typeof fix !== "boolean") {
    errors.push(`${label}.fix must be a boolean`);
  }

  const base = {
    id: typeof id === "string" ? id : "",
    name,
    severity,
    reference,
    remediation,
    fix: fix === true,
  };

  switch (input.type) {
    case "file-mode": {
      assertNoExtraKeys(input, FILE_MODE_KEYS, label, errors);
      const config = parseFileMode(input, label, base, errors);
      return errors.length === startErrors ? config : null;
    }
    case "sshd-option": {
      assertNoExtraKeys(input, SSHD_OPTION_KEYS, label, errors);
      const config = parseSshdOption(input, label, base, errors);
      return errors.length === startErrors ? config : null;
    }
    default:
      errors.push(`${label}.type must be 'file-mode' or 'sshd-option'`);
      return null;
  }
}

type CustomBase = Omit<FileModeCustomCheck, "type" | "path" | "mode">;

function parseFileMode(
  input: Record<string, unknown>,
  label: string,
  base: CustomBase,
  errors: string[],
): FileModeCustomCheck {
  const path = requireString(input.path, `${label}.path`, errors);
  if (path && !path.startsWith("/")) {
    errors.push(`${label}.path must be absolute`);
  }
  // YAML reads an unquoted 644 as a decimal number.
  const rawMode = typeof input.mode === "number" ? String(input.mode) : input.mode;
  if (typeof rawMode !== "string" || !OCTAL_MODE.test(rawMode)) {
    errors.push(`${label}.mode must be an octal mode such as "644"`);
  }
  return {
    ...base,
    type: "file-mode",
    path,
    mode: typeof rawMode === "string" ? rawMode : "",
  };
}

function parseSshdOption(
  input: Record<string, unknown>,
  label: string,
  base: CustomBase,
  errors: string[],
): SshdOptionCustomCheck {
  const keyword = requireString(input.keyword, `${label}.keyword`, errors);
  if (keyword && !SSHD_KEYWORD.test(keyword)) {
    errors.push(`${label}.keyword must be an sshd_config keyword`);
  }

  const expected: string[] = [];
  if (!Array.isArray(input.expected) || input.expected.length === 0) {
    errors.push(`${label}.expected must be a non-empty list`);
  } else {
    const values: unknown[] = input.expected;
    for (const value of values) {
      if (typeof value !== "string" && typeof value !== "number") {
        errors.push(`${label}.expected entries must be strings`);
        continue;
      }
      expected.push(String(value).toLowerCase());
    }
  }

  const whenUnset = input.when_unset ?? "fail";
  if (typeof whenUnset !== "string" || !VERDICTS.has(whenUnset)) {
    errors.push(`${label}.when_unset must be pass, warn or fail`);
  }
  const mismatch = input.mismatch ?? "fail";
  if (mismatch !== "warn" && mismatch !== "fail") {
    errors.push(`${label}.mismatch must be warn or fail`);
  }

  return {
    ...base,
    type: "sshd-option",
    keyword,
    expected,
    when_unset: isVerdict(whenUnset) ? whenUnset : "fail",
    mismatch: mismatch === "warn" ? "warn" : "fail",
  };
}

function parseSeverity(
  input: unknown,
  label: string,
  errors: string[],
): Severity {
  const value = typeof input === "string" ? input.toUpperCase() : input;
  const severity = SEVERITIES.find((candidate) => candidate === value);
  if (!severity) {
    errors.push(`${label} must be one of ${SEVERITIES.join(", ")}`);
    return Severity.Info;
  }
  return severity;
}

function requireString(input: unknown, label: string, errors: string[]): string {
  if (typeof input !== "string" || input.trim() === "") {
    errors.push(`${label} must be a non-empty string`);
    return "";
  }
  return input;
}

function optionalString(
  input: unknown,
  label: string,
  errors: string[],
): string | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "string") {
    errors.push(`${label} must be a string`);
    return undefined;
  }
  return input;
}

function isVerdict(value: unknown): value is Verdict {
  return typeof value === "string" && VERDICTS.has(value);
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  label: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${label} has unknown key '${key}'`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
