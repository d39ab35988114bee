import { CheckStatus, type ScanRun } from "../engine/types.js";
import { ConfigurationError, InitializationError } from "../errors.js";

export const enum ExitCode {
  Success = 0,
  Findings = 1,
  Configuration = 2,
  Initialization = 3,
  Internal = 4,
}

export function exitCodeForRun(run: ScanRun): ExitCode {
  const failing = run.outcomes.some(
    (outcome) =>
      outcome.status === CheckStatus.Fail ||
      outcome.status === CheckStatus.Error,
  );
  return failing ? ExitCode.Findings : ExitCode.Success;
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return ExitCode.Configuration;
  }
  if (error instanceof InitializationError) {
    return ExitCode.Initialization;
  }
  // Scan timeouts and anything unexpected.
  return ExitCode.Internal;
}
