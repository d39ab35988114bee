import {
  BUILTIN_CHECKS,
  createCheckCatalog,
  type CheckCatalog,
} from "../checks/catalog.js";
import { CATEGORY_ORDER } from "../checks/types.js";
import type { CheckDefinition } from "../checks/types.js";
import { ConfigurationError } from "../errors.js";
import { createCustomCheck } from "./custom-checks.js";
import { loadProfilesWithOverrides } from "./profile-loader.js";
import type { ProfileDefinition, ProfileSummary } from "./types.js";

export interface RegistryOptions {
  readonly profilesDir: string;
  readonly overrideDir?: string;
  readonly checks?: readonly CheckDefinition[];
}

/**
 * Catalogue of checks grouped into profiles. Built once at startup; every
 * profile is resolved eagerly so a bad profile fails before any scan.
 */
export class CheckRegistry {
  private readonly resolved = new Map<string, readonly CheckDefinition[]>();

  constructor(
    private readonly profiles: ReadonlyMap<string, ProfileDefinition>,
    catalog: CheckCatalog,
  ) {
    const problems: string[] = [];
    for (const profile of profiles.values()) {
      try {
        this.resolved.set(profile.name, resolveProfile(profile, catalog));
      } catch (error) {
        problems.push(error instanceof Error ? error.message : String(error));
      }
    }
    if (problems.length > 0) {
      throw new ConfigurationError(problems.join("; "));
    }
  }

  hasProfile(name: string): boolean {
    return this.resolved.has(name);
  }

  listProfiles(): ProfileSummary[] {
    return [...this.profiles.values()]
      .map((profile) => ({
        name: profile.name,
        description: profile.description,
        checkCount: this.resolved.get(profile.name)?.length ?? 0,
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Checks of a profile ordered by category, then by their position in the
   * profile definition.
   */
  listChecks(profileName: string): CheckDefinition[] {
    const checks = this.resolved.get(profileName);
    if (!checks) {
      const known = [...this.resolved.keys()].sort().join(", ");
      throw new ConfigurationError(
        `Unknown profile '${profileName}'. Available profiles: ${known}`,
      );
    }
    return [...checks];
  }
}

export async function loadCheckRegistry(
  options: RegistryOptions,
): Promise<CheckRegistry> {
  const profiles = await loadProfilesWithOverrides({
    baseDir: options.profilesDir,
    overrideDir: options.overrideDir,
  });
  const catalog = createCheckCatalog(options.checks ?? BUILTIN_CHECKS);
  return new CheckRegistry(profiles, catalog);
}

function resolveProfile(
  profile: ProfileDefinition,
  catalog: CheckCatalog,
): CheckDefinition[] {
  const checks: CheckDefinition[] = [];
  const unknown: string[] = [];
  for (const id of profile.checks) {
    const check = catalog.get(id);
    if (check) {
      checks.push(check);
    } else {
      unknown.push(id);
    }
  }
  if (unknown.length > 0) {
    throw new Error(
      `Invalid profile ${profile.source}: unknown check ids ${unknown.join(", ")}`,
    );
  }

  for (const custom of profile.custom_checks) {
    if (catalog.has(custom.id)) {
      throw new Error(
        `Invalid profile ${profile.source}: custom check ${custom.id} shadows a built-in check`,
      );
    }
    checks.push(createCustomCheck(custom));
  }

  return sortByCategory(checks);
}

function sortByCategory(checks: readonly CheckDefinition[]): CheckDefinition[] {
  const rank = (check: CheckDefinition): number =>
    CATEGORY_ORDER.indexOf(check.category);
  return checks
    .map((check, position) => ({ check, position }))
    .sort((a, b) => rank(a.check) - rank(b.check) || a.position - b.position)
    .map((entry) => entry.check);
}
