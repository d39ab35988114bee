import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { InitializationError } from "../errors.js";

export async function resolveProfilesDirectory(): Promise<string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const bundledProfilesDir = path.resolve(moduleDir, "..", "..", "profiles");
  if (await existsDirectory(bundledProfilesDir)) {
    return bundledProfilesDir;
  }

  const cwdProfilesDir = path.resolve(process.cwd(), "profiles");
  if (await existsDirectory(cwdProfilesDir)) {
    return cwdProfilesDir;
  }

  throw new InitializationError(
    "Unable to find built-in profiles directory. Reinstall the package or run from its root.",
  );
}

export async function assertDirectory(
  targetPath: string,
  label: string,
): Promise<void> {
  if (!(await existsDirectory(targetPath))) {
    throw new InitializationError(`${label} ${targetPath} is not a readable directory`);
  }
}

export async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
