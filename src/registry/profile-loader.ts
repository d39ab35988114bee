import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigurationError, errorMessage } from "../errors.js";
import { validateProfile } from "./profile-validator.js";
import type { ProfileDefinition } from "./types.js";

export interface LoadProfilesOptions {
  readonly baseDir: string;
  readonly overrideDir?: string;
}

/**
 * Load the built-in profiles and let profiles in `overrideDir` replace
 * built-ins of the same name or add new ones.
 */
export async function loadProfilesWithOverrides(
  options: LoadProfilesOptions,
): Promise<Map<string, ProfileDefinition>> {
  const base = await loadProfiles(options.baseDir);
  if (!options.overrideDir) {
    return base;
  }

  const override = await loadProfiles(options.overrideDir);
  for (const [name, profile] of override) {
    base.set(name, profile);
  }
  return base;
}

export async function loadProfiles(
  profilesDir: string,
): Promise<Map<string, ProfileDefinition>> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(profilesDir, { withFileTypes: true });
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read profiles directory ${profilesDir}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const files = entries
    .filter((entry) => entry.isFile() && /\.ya?ml$/.test(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  const profiles = new Map<string, ProfileDefinition>();
  for (const fileName of files) {
    const filePath = path.join(profilesDir, fileName);
    const profile = await loadProfileFile(filePath);
    const existing = profiles.get(profile.name);
    if (existing) {
      throw new ConfigurationError(
        `Profile '${profile.name}' is defined in both ${existing.source} and ${filePath}`,
      );
    }
    profiles.set(profile.name, profile);
  }
  return profiles;
}

export async function loadProfileFile(
  filePath: string,
): Promise<ProfileDefinition> {
  let doc: unknown;
  try {
    const raw = await fs.readFile(filePath, "utf8");
    doc = yaml.load(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid profile ${filePath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  try {
    return validateProfile(doc, filePath);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid profile ${filePath}: ${errorMessage(error)}`,
    );
  }
}
