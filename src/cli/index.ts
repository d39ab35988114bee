#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { loadScanConfig, type RawConfig } from "../config/scan-config.js";
import { errorMessage } from "../errors.js";
import { createLogger, type LogLevel, type Logger } from "../logging/logger.js";
import { REPORT_FORMATS } from "../report/types.js";
import { exitCodeForError } from "./exit-codes.js";
import { runListCommand } from "./list-command.js";
import { runScanCommand } from "./scan-command.js";

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly color?: boolean;
}

interface ScanFlags {
  readonly config?: string;
  readonly root?: string;
  readonly exclude?: string;
  readonly includeOnly?: string;
  readonly fix?: boolean;
  readonly timeout?: string;
  readonly scanTimeout?: string;
  readonly concurrency?: string;
  readonly format?: string;
  readonly out?: string;
  readonly profilesDir?: string;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("hardencheck")
  .description("Linux configuration compliance scanner")
  .version(toolVersion)
  .option("-v, --verbose", "Verbose output")
  .option("-q, --quiet", "Only log errors")
  .option("--no-color", "Disable colored log output");

program
  .command("scan", { isDefault: true })
  .argument("[profile]", "Profile to run (default: full)")
  .option("--config <file>", "YAML config file")
  .option("--root <path>", "Root directory of the system to scan")
  .option("--exclude <ids>", "Comma-separated check ids to skip")
  .option("--include-only <ids>", "Comma-separated check ids to run exclusively")
  .option("--fix", "Apply remediation and re-check failing checks")
  .option("--timeout <seconds>", "Per-check timeout, 0 disables")
  .option("--scan-timeout <seconds>", "Whole-scan timeout, 0 disables")
  .option("--concurrency <number>", "Checks to run in parallel")
  .option(`-f, --format <format>`, `Output format (${REPORT_FORMATS.join("|")})`)
  .option("-o, --out <file>", "Write report to file")
  .option("--profiles-dir <path>", "Directory of profiles overriding built-ins")
  .action(async (profile: string | undefined, flags: ScanFlags) => {
    const globals = program.opts<GlobalOptions>();
    let logger = createCliLogger(globals);
    try {
      const config = await loadScanConfig({
        configPath: flags.config,
        cli: cliConfig(profile, flags, globals),
      });
      logger = createCliLogger(globals, config.logLevel);
      const result = await runScanCommand(config, logger);
      if (!config.out) {
        await writeStdout(result.output);
      }
      process.exitCode = result.exitCode;
    } catch (error) {
      fail(logger, error);
    }
  });

program
  .command("list")
  .description("List profiles, or the checks of one profile")
  .argument("[profile]", "Profile whose checks to list")
  .option("--profiles-dir <path>", "Directory of profiles overriding built-ins")
  .action(async (profile: string | undefined, flags: { profilesDir?: string }) => {
    const logger = createCliLogger(program.opts<GlobalOptions>());
    try {
      const output = await runListCommand({
        profile,
        overrideDir: flags.profilesDir
          ? path.resolve(flags.profilesDir)
          : undefined,
      });
      await writeStdout(`${output}\n`);
    } catch (error) {
      fail(logger, error);
    }
  });

await program.parseAsync(process.argv);

function cliConfig(
  profile: string | undefined,
  flags: ScanFlags,
  globals: GlobalOptions,
): RawConfig {
  return {
    profile,
    root: flags.root,
    exclude: flags.exclude,
    include_only: flags.includeOnly,
    fix: flags.fix,
    timeout: flags.timeout,
    scan_timeout: flags.scanTimeout,
    concurrency: flags.concurrency,
    format: flags.format,
    out: flags.out,
    profiles_dir: flags.profilesDir,
    log_level: logLevelFromFlags(globals),
  };
}

function logLevelFromFlags(globals: GlobalOptions): LogLevel | undefined {
  if (globals.verbose) {
    return "debug";
  }
  if (globals.quiet) {
    return "error";
  }
  return undefined;
}

function createCliLogger(globals: GlobalOptions, level?: LogLevel): Logger {
  return createLogger({
    level: logLevelFromFlags(globals) ?? level ?? "info",
    color: (globals.color ?? true) && process.stderr.isTTY,
  });
}

function fail(logger: Logger, error: unknown): void {
  logger.error(errorMessage(error));
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  process.exitCode = exitCodeForError(error);
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json: unknown = JSON.parse(raw);
  if (
    typeof json === "object" &&
    json !== null &&
    "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "0.0.0";
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
