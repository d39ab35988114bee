import {
  ACCOUNT_CHECKS,
  FILESYSTEM_CHECKS,
  SSH_CHECKS,
} from "../probes/index.js";
import type { CheckDefinition } from "./types.js";

/**
 * Registration table of every built-in check, in declaration order.
 */
export const BUILTIN_CHECKS: readonly CheckDefinition[] = [
  ...FILESYSTEM_CHECKS,
  ...ACCOUNT_CHECKS,
  ...SSH_CHECKS,
];

export type CheckCatalog = ReadonlyMap<string, CheckDefinition>;

export function createCheckCatalog(
  checks: readonly CheckDefinition[] = BUILTIN_CHECKS,
): CheckCatalog {
  const catalog = new Map<string, CheckDefinition>();
  for (const check of checks) {
    if (catalog.has(check.id)) {
      throw new Error(`Duplicate check id in catalog: ${check.id}`);
    }
    catalog.set(check.id, check);
  }
  return catalog;
}
