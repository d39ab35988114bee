import pLimit from "p-limit";
import type { CheckDefinition } from "../checks/types.js";
import { ScanTimeoutError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { runCheck } from "./check-runner.js";
import {
  createExecutionPolicy,
  decide,
  unmatchedPolicyIds,
} from "./execution-policy.js";
import { ScanRunBuilder } from "./result-aggregator.js";
import type { CheckOutcome, ScanRun } from "./types.js";

export const DEFAULT_CHECK_TIMEOUT_SECONDS = 300;
export const DEFAULT_SCAN_TIMEOUT_SECONDS = 3600;
/** Longest delay setTimeout honours; larger ones fire after 1ms. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export interface ScanOptions {
  readonly profile: string;
  /** Checks in registry order. */
  readonly checks: readonly CheckDefinition[];
  readonly rootPath: string;
  readonly fixMode?: boolean;
  readonly exclude?: readonly string[];
  readonly includeOnly?: readonly string[];
  /** Per check; 0 disables. */
  readonly timeoutSeconds?: number;
  /** Whole run; 0 disables. */
  readonly scanTimeoutSeconds?: number;
  /** Checks in flight at once. 1 runs them sequentially. */
  readonly concurrency?: number;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

export async function runScan(options: ScanOptions): Promise<ScanRun> {
  const clock = options.clock ?? (() => new Date());
  const logger = options.logger ?? createSilentLogger();
  const fixMode = options.fixMode ?? false;
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const timeoutMs = timerDelayMs(
    options.timeoutSeconds ?? DEFAULT_CHECK_TIMEOUT_SECONDS,
  );
  const scanTimeoutMs = timerDelayMs(
    options.scanTimeoutSeconds ?? DEFAULT_SCAN_TIMEOUT_SECONDS,
  );

  const started = clock();
  const scanId = createScanId(started);
  const builder = new ScanRunBuilder({
    scanId,
    profile: options.profile,
    target: options.rootPath,
    fixMode,
    startTime: started.toISOString(),
  });

  const policy = createExecutionPolicy(options.exclude, options.includeOnly);
  const unmatched = unmatchedPolicyIds(policy, options.checks);
  if (unmatched.length > 0) {
    logger.warn(
      `Ignoring check ids not in profile '${options.profile}': ${unmatched.join(", ")}`,
    );
  }

  const runnable: { check: CheckDefinition; index: number }[] = [];
  options.checks.forEach((check, index) => {
    const decision = decide(policy, check);
    if (decision.action === "skip") {
      logger.debug(`Skipping ${check.id} (${decision.reason})`);
      builder.addSkipped({
        checkId: check.id,
        name: check.name,
        category: check.category,
        severity: check.severity,
        reason: decision.reason,
        index,
      });
      return;
    }
    runnable.push({ check, index });
  });

  logger.info(
    `Scan ${scanId}: running ${runnable.length} checks from profile '${options.profile}' against ${options.rootPath}${fixMode ? " (fix mode)" : ""}`,
  );

  const scanController = new AbortController();
  const scanTimer =
    scanTimeoutMs > 0
      ? setTimeout(
          () => scanController.abort(new ScanTimeoutError(scanTimeoutMs)),
          scanTimeoutMs,
        )
      : undefined;

  const execute = ({
    check,
    index,
  }: {
    check: CheckDefinition;
    index: number;
  }): Promise<CheckOutcome> =>
    runCheck(check, index, {
      scanId,
      rootPath: options.rootPath,
      fixMode,
      timeoutMs,
      logger,
      scanSignal: scanController.signal,
      clock,
    });

  try {
    if (concurrency === 1) {
      for (const entry of runnable) {
        builder.addOutcome(await execute(entry));
      }
    } else {
      const limit = pLimit(concurrency);
      const outcomes = await Promise.all(
        runnable.map((entry) => limit(() => execute(entry))),
      );
      for (const outcome of outcomes) {
        builder.addOutcome(outcome);
      }
    }
  } finally {
    clearTimeout(scanTimer);
  }

  const elapsedMs = clock().getTime() - started.getTime();
  const run = builder.build(Math.round(elapsedMs) / 1000);
  logger.info(
    `Scan ${scanId} finished: ${run.summary.pass} passed, ${run.summary.warn} warnings, ${run.summary.fail} failed, ${run.summary.error} errors, ${run.summary.skip} skipped (score ${run.complianceScore}, ${run.riskLevel})`,
  );
  return run;
}

/**
 * `YYYYMMDD_HHMMSS_mmm` in local time.
 */
/** Seconds to a timer delay; 0 (no timer) beyond what setTimeout can hold. */
function timerDelayMs(seconds: number): number {
  return seconds > MAX_TIMEOUT_SECONDS ? 0 : seconds * 1000;
}

export function createScanId(date: Date): string {
  const pad = (value: number, width = 2): string =>
    String(value).padStart(width, "0");
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}_${pad(date.getMilliseconds(), 3)}`;
}
