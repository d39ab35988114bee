import { probeError } from "../checks/probe-result.js";
import type {
  CheckDefinition,
  ProbeResult,
  ScanContext,
} from "../checks/types.js";
import {
  errorMessage,
  ProbeExecutionError,
  ProbeTimeoutError,
  RemediationError,
} from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { CheckStatus, type CheckOutcome, type ExecutedStatus } from "./types.js";

export interface CheckRunOptions {
  readonly scanId: string;
  readonly rootPath: string;
  readonly fixMode: boolean;
  /** Budget for the whole check, remediation included. 0 disables it. */
  readonly timeoutMs: number;
  readonly logger: Logger;
  /** Aborting it stops the check and rethrows its reason. */
  readonly scanSignal?: AbortSignal;
  readonly clock?: () => Date;
}

interface Verdict {
  readonly status: ExecutedStatus;
  readonly message: string;
  readonly remediationApplied: boolean;
}

export function statusForResult(result: ProbeResult): ExecutedStatus {
  switch (result.kind) {
    case "success":
      return CheckStatus.Pass;
    case "failure":
      return result.degree === "hard" ? CheckStatus.Fail : CheckStatus.Warn;
    case "error":
      return CheckStatus.Error;
  }
}

/**
 * Run one check to a final outcome. Probe and remediation failures become
 * ERROR or annotated outcomes; only an abort of the scan itself escapes.
 */
export async function runCheck(
  check: CheckDefinition,
  index: number,
  options: CheckRunOptions,
): Promise<CheckOutcome> {
  const clock = options.clock ?? (() => new Date());
  const logger = options.logger.child({ check: check.id });

  let verdict: Verdict;
  try {
    verdict = await withTimeout(
      check.id,
      options.timeoutMs,
      options.scanSignal,
      (signal) =>
        evaluate(check, {
          scanId: options.scanId,
          rootPath: options.rootPath,
          fixMode: options.fixMode,
          signal,
          logger,
        }),
    );
  } catch (error) {
    if (!(error instanceof ProbeTimeoutError)) {
      throw error;
    }
    logger.warn(`Check timed out after ${error.timeoutMs}ms`);
    verdict = {
      status: CheckStatus.Error,
      message: error.message,
      remediationApplied: false,
    };
  }

  logger.debug(`${verdict.status}: ${verdict.message}`);
  return {
    checkId: check.id,
    name: check.name,
    category: check.category,
    severity: check.severity,
    reference: check.reference,
    status: verdict.status,
    message: verdict.message,
    remediation: check.remediation?.description,
    remediationApplied: verdict.remediationApplied,
    timestamp: clock().toISOString(),
    index,
  };
}

async function evaluate(
  check: CheckDefinition,
  context: ScanContext,
): Promise<Verdict> {
  const first = await invokeProbe(check, context);
  const status = statusForResult(first);
  const remediation = check.remediation;
  const apply = remediation?.apply;
  const remediable = status === CheckStatus.Fail || status === CheckStatus.Warn;

  if (!context.fixMode || !remediable || !remediation || !apply) {
    return { status, message: first.message, remediationApplied: false };
  }

  // A probe that ignored its signal may return after the check timed out.
  context.signal.throwIfAborted();
  try {
    context.logger.info(`Applying remediation: ${remediation.description}`);
    await apply(context);
  } catch (error) {
    if (context.signal.aborted) {
      throw context.signal.reason;
    }
    const failure = new RemediationError(check.id, errorMessage(error), {
      cause: error,
    });
    context.logger.warn(`Remediation failed: ${failure.message}`);
    return {
      status,
      message: `${first.message}; remediation failed: ${failure.message}`,
      remediationApplied: false,
    };
  }
  context.signal.throwIfAborted();

  const second = await invokeProbe(check, context);
  switch (second.kind) {
    case "success":
      return {
        status: CheckStatus.Pass,
        message: `${first.message} (remediated: ${second.message})`,
        remediationApplied: true,
      };
    case "failure":
      return {
        status: statusForResult(second),
        message: `${second.message} (remediation did not resolve the issue)`,
        remediationApplied: true,
      };
    case "error":
      return {
        status: CheckStatus.Error,
        message: `Re-check after remediation failed: ${second.message}`,
        remediationApplied: true,
      };
  }
}

async function invokeProbe(
  check: CheckDefinition,
  context: ScanContext,
): Promise<ProbeResult> {
  try {
    return await check.probe(context);
  } catch (error) {
    if (context.signal.aborted) {
      throw context.signal.reason;
    }
    const failure = new ProbeExecutionError(check.id, errorMessage(error), {
      cause: error,
    });
    context.logger.warn(`Probe failed: ${failure.message}`);
    return probeError(failure.message);
  }
}

/**
 * Race `work` against the check budget and the scan signal. The signal handed
 * to `work` is aborted either way so cooperative probes stop early.
 */
async function withTimeout<T>(
  checkId: string,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  parent?.throwIfAborted();
  const controller = new AbortController();
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(controller.signal.reason),
      { once: true },
    );
  });

  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const timer =
    timeoutMs > 0
      ? setTimeout(
          () => controller.abort(new ProbeTimeoutError(checkId, timeoutMs)),
          timeoutMs,
        )
      : undefined;

  try {
    return await Promise.race([work(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
