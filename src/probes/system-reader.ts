import type { Dirent, Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

export interface FileStatus {
  /** Permission bits in octal, as `stat -c '%a'` prints them. */
  readonly mode: string;
  readonly uid: number;
  readonly gid: number;
  readonly isDirectory: boolean;
  readonly isFile: boolean;
}

export interface TreeEntry {
  readonly systemPath: string;
  readonly type: "file" | "directory";
  readonly permissions: number;
  readonly uid: number;
  readonly gid: number;
}

export interface WalkOptions {
  readonly excludes?: readonly string[];
  readonly signal?: AbortSignal;
}

export type TreeVisitor = (entry: TreeEntry) => void | Promise<void>;

export const DEFAULT_WALK_EXCLUDES: readonly string[] = [
  "/proc",
  "/sys",
  "/dev",
  "/run",
  "/tmp",
  "/var/tmp",
];

/**
 * Map an absolute system path (`/etc/passwd`) onto the scan root.
 */
export function resolveSystemPath(rootPath: string, systemPath: string): string {
  if (!path.posix.isAbsolute(systemPath)) {
    throw new Error(`System path must be absolute: ${systemPath}`);
  }
  return path.join(rootPath, systemPath);
}

export async function statSystemPath(
  rootPath: string,
  systemPath: string,
): Promise<FileStatus | null> {
  try {
    const stats = await fs.stat(resolveSystemPath(rootPath, systemPath));
    return {
      mode: formatMode(stats.mode),
      uid: stats.uid,
      gid: stats.gid,
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
    };
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function readSystemFile(
  rootPath: string,
  systemPath: string,
): Promise<string | null> {
  try {
    return await fs.readFile(resolveSystemPath(rootPath, systemPath), "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function writeSystemFile(
  rootPath: string,
  systemPath: string,
  content: string,
): Promise<void> {
  await fs.writeFile(resolveSystemPath(rootPath, systemPath), content, "utf8");
}

export async function chmodSystemPath(
  rootPath: string,
  systemPath: string,
  mode: number,
): Promise<void> {
  await fs.chmod(resolveSystemPath(rootPath, systemPath), mode);
}

/**
 * Depth-first walk of the tree under the scan root, in name order. Symbolic
 * links are not followed; unreadable directories are passed over.
 */
export async function walkSystemTree(
  rootPath: string,
  visitor: TreeVisitor,
  options: WalkOptions = {},
): Promise<void> {
  const excludes = (options.excludes ?? DEFAULT_WALK_EXCLUDES).map(
    normalizeSystemPath,
  );
  await walkDirectory(rootPath, "/", visitor, excludes, options.signal);
}

async function walkDirectory(
  rootPath: string,
  systemDir: string,
  visitor: TreeVisitor,
  excludes: readonly string[],
  signal: AbortSignal | undefined,
): Promise<void> {
  signal?.throwIfAborted();

  let dirEntries: Dirent[];
  try {
    dirEntries = await fs.readdir(resolveSystemPath(rootPath, systemDir), {
      withFileTypes: true,
    });
  } catch (error) {
    if (isSkippable(error)) {
      return;
    }
    throw error;
  }
  dirEntries.sort((a, b) => a.name.localeCompare(b.name));

  for (const dirent of dirEntries) {
    if (dirent.isSymbolicLink()) {
      continue;
    }
    const systemPath = path.posix.join(systemDir, dirent.name);
    if (isExcluded(systemPath, excludes)) {
      continue;
    }
    if (!dirent.isDirectory() && !dirent.isFile()) {
      continue;
    }

    let stats: Stats;
    try {
      stats = await fs.lstat(resolveSystemPath(rootPath, systemPath));
    } catch (error) {
      if (isSkippable(error)) {
        continue;
      }
      throw error;
    }

    await visitor({
      systemPath,
      type: dirent.isDirectory() ? "directory" : "file",
      permissions: stats.mode & 0o7777,
      uid: stats.uid,
      gid: stats.gid,
    });

    if (dirent.isDirectory()) {
      await walkDirectory(rootPath, systemPath, visitor, excludes, signal);
    }
  }
}

export function formatMode(mode: number): string {
  return (mode & 0o7777).toString(8);
}

function normalizeSystemPath(value: string): string {
  const normalized = path.posix.normalize(value);
  return normalized.length > 1 && normalized.endsWith("/")
    ? normalized.slice(0, -1)
    : normalized;
}

function isExcluded(systemPath: string, excludes: readonly string[]): boolean {
  return excludes.some(
    (exclude) => systemPath === exclude || systemPath.startsWith(`${exclude}/`),
  );
}

function isNotFound(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function isSkippable(error: unknown): boolean {
  const code = errorCode(error);
  return code === "ENOENT" || code === "EACCES" || code === "EPERM";
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
