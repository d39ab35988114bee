import {
  calculateComplianceScore,
  riskLevelForScore,
} from "../scoring/score-calculator.js";
import {
  CheckStatus,
  type CheckOutcome,
  type ScanRun,
  type ScanSummary,
  type SkippedCheck,
} from "./types.js";

export interface ScanRunHeader {
  readonly scanId: string;
  readonly profile: string;
  readonly target: string;
  readonly fixMode: boolean;
  readonly startTime: string;
}

export function summarize(
  outcomes: readonly CheckOutcome[],
  skipped: readonly SkippedCheck[],
): ScanSummary {
  const count = (status: CheckStatus): number =>
    outcomes.filter((outcome) => outcome.status === status).length;
  return {
    total: outcomes.length,
    pass: count(CheckStatus.Pass),
    warn: count(CheckStatus.Warn),
    fail: count(CheckStatus.Fail),
    error: count(CheckStatus.Error),
    skip: skipped.length,
  };
}

/**
 * Collects outcomes in completion order while a scan is running and produces
 * the frozen ScanRun once. Not exposed outside the engine.
 */
export class ScanRunBuilder {
  private readonly outcomes: CheckOutcome[] = [];
  private readonly skipped: SkippedCheck[] = [];
  private built = false;

  constructor(private readonly header: ScanRunHeader) {}

  addOutcome(outcome: CheckOutcome): this {
    this.assertOpen();
    this.outcomes.push(Object.freeze({ ...outcome }));
    return this;
  }

  addSkipped(skipped: SkippedCheck): this {
    this.assertOpen();
    this.skipped.push(Object.freeze({ ...skipped }));
    return this;
  }

  build(durationSeconds: number): ScanRun {
    this.assertOpen();
    this.built = true;

    const outcomes = Object.freeze(sortByIndex(this.outcomes));
    const skipped = Object.freeze(sortByIndex(this.skipped));
    const summary = Object.freeze(summarize(outcomes, skipped));
    const complianceScore = calculateComplianceScore(summary);

    return Object.freeze({
      ...this.header,
      durationSeconds,
      outcomes,
      skipped,
      summary,
      complianceScore,
      riskLevel: riskLevelForScore(complianceScore),
    });
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error("Scan run already built");
    }
  }
}

function sortByIndex<T extends { readonly index: number }>(
  items: readonly T[],
): T[] {
  return [...items].sort((a, b) => a.index - b.index);
}
