import type { CheckDefinition } from "../checks/types.js";
import { loadCheckRegistry } from "../registry/check-registry.js";
import { renderAsciiTable } from "../report/text-reporter.js";
import { assertDirectory, resolveProfilesDirectory } from "./runtime-paths.js";

export interface ListOptions {
  /** Show the checks of one profile instead of the profile list. */
  readonly profile?: string;
  readonly overrideDir?: string;
  readonly profilesDir?: string;
  readonly checks?: readonly CheckDefinition[];
}

export async function runListCommand(options: ListOptions = {}): Promise<string> {
  if (options.overrideDir) {
    await assertDirectory(options.overrideDir, "Profiles directory");
  }
  const registry = await loadCheckRegistry({
    profilesDir: options.profilesDir ?? (await resolveProfilesDirectory()),
    overrideDir: options.overrideDir,
    checks: options.checks,
  });

  if (options.profile) {
    return renderAsciiTable(
      registry
        .listChecks(options.profile)
        .map((check) => [check.id, check.category, check.severity, check.name]),
      ["ID", "Category", "Severity", "Check"],
    );
  }

  return renderAsciiTable(
    registry
      .listProfiles()
      .map((profile) => [
        profile.name,
        String(profile.checkCount),
        profile.description ?? "",
      ]),
    ["Profile", "Checks", "Description"],
  );
}
