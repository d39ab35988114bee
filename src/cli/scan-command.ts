import fs from "node:fs/promises";
import path from "node:path";
import type { CheckDefinition } from "../checks/types.js";
import type { ScanConfig } from "../config/scan-config.js";
import { runScan } from "../engine/scan-engine.js";
import type { ScanRun } from "../engine/types.js";
import { errorMessage, InitializationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { loadCheckRegistry } from "../registry/check-registry.js";
import { renderReport } from "../report/index.js";
import { exitCodeForRun, type ExitCode } from "./exit-codes.js";
import { assertDirectory, resolveProfilesDirectory } from "./runtime-paths.js";

export interface ScanCommandDeps {
  readonly profilesDir?: string;
  readonly checks?: readonly CheckDefinition[];
  readonly clock?: () => Date;
}

export interface ScanCommandResult {
  readonly run: ScanRun;
  readonly output: string;
  readonly exitCode: ExitCode;
}

export async function runScanCommand(
  config: ScanConfig,
  logger: Logger,
  deps: ScanCommandDeps = {},
): Promise<ScanCommandResult> {
  await assertDirectory(config.root, "Scan root");
  if (config.profilesDir) {
    await assertDirectory(config.profilesDir, "Profiles directory");
  }

  const registry = await loadCheckRegistry({
    profilesDir: deps.profilesDir ?? (await resolveProfilesDirectory()),
    overrideDir: config.profilesDir,
    checks: deps.checks,
  });
  const checks = registry.listChecks(config.profile);

  const run = await runScan({
    profile: config.profile,
    checks,
    rootPath: config.root,
    fixMode: config.fix,
    exclude: config.exclude,
    includeOnly: config.includeOnly,
    timeoutSeconds: config.timeoutSeconds,
    scanTimeoutSeconds: config.scanTimeoutSeconds,
    concurrency: config.concurrency,
    logger,
    clock: deps.clock,
  });

  const output = renderReport(run, config.format);
  if (config.out) {
    await writeReport(config.out, output);
    logger.info(`Report written to ${config.out}`);
  }

  return { run, output, exitCode: exitCodeForRun(run) };
}

async function writeReport(outPath: string, output: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await fs.writeFile(outPath, output, "utf8");
  } catch (error) {
    throw new InitializationError(
      `Unable to write report to ${outPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}
