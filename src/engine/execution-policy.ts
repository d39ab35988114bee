import type { CheckDefinition } from "../checks/types.js";
import type { ExecutionPolicy, SkipReason } from "./types.js";

export type CheckDecision =
  | { readonly action: "run" }
  | { readonly action: "skip"; readonly reason: SkipReason };

const RUN: CheckDecision = { action: "run" };

export function createExecutionPolicy(
  exclude: Iterable<string> = [],
  includeOnly: Iterable<string> = [],
): ExecutionPolicy {
  return { exclude: new Set(exclude), includeOnly: new Set(includeOnly) };
}

/**
 * Exclusion is evaluated before the include list, so an id present in both
 * is skipped as excluded.
 */
export function decide(
  policy: ExecutionPolicy,
  check: Pick<CheckDefinition, "id">,
): CheckDecision {
  if (policy.exclude.has(check.id)) {
    return { action: "skip", reason: "excluded" };
  }
  if (policy.includeOnly.size > 0 && !policy.includeOnly.has(check.id)) {
    return { action: "skip", reason: "not included" };
  }
  return RUN;
}

/**
 * Ids named by the policy that the profile does not contain.
 */
export function unmatchedPolicyIds(
  policy: ExecutionPolicy,
  checks: readonly Pick<CheckDefinition, "id">[],
): string[] {
  const known = new Set(checks.map((check) => check.id));
  const unmatched = new Set<string>();
  for (const id of [...policy.exclude, ...policy.includeOnly]) {
    if (!known.has(id)) {
      unmatched.add(id);
    }
  }
  return [...unmatched].sort();
}
