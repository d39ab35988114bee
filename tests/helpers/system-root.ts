import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  BUILTIN_CHECKS,
  type CheckDefinition,
  type ScanContext,
} from "../../src/checks/index.js";
import { createSilentLogger } from "../../src/logging/logger.js";

export async function createSystemRoot(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "hardencheck-root-"));
}

export async function removeSystemRoot(root: string | undefined): Promise<void> {
  if (root) {
    await fs.rm(root, { recursive: true, force: true });
  }
}

/**
 * Write a file under the fake root with an exact mode, creating parents.
 */
export async function putFile(
  root: string,
  systemPath: string,
  content: string,
  mode = 0o644,
): Promise<string> {
  const target = path.join(root, systemPath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, "utf8");
  await fs.chmod(target, mode);
  return target;
}

export async function putDir(
  root: string,
  systemPath: string,
  mode = 0o755,
): Promise<string> {
  const target = path.join(root, systemPath);
  await fs.mkdir(target, { recursive: true });
  await fs.chmod(target, mode);
  return target;
}

export async function modeOf(root: string, systemPath: string): Promise<string> {
  const stats = await fs.stat(path.join(root, systemPath));
  return (stats.mode & 0o7777).toString(8);
}

export function testContext(
  root: string,
  overrides: Partial<ScanContext> = {},
): ScanContext {
  return {
    scanId: "20240101_000000_000",
    rootPath: root,
    fixMode: false,
    signal: new AbortController().signal,
    logger: createSilentLogger(),
    ...overrides,
  };
}

export function builtinCheck(id: string): CheckDefinition {
  const check = BUILTIN_CHECKS.find((candidate) => candidate.id === id);
  if (!check) {
    throw new Error(`No built-in check ${id}`);
  }
  return check;
}

/**
 * passwd and group entries for the uid/gid running the tests, so files the
 * tests create are owned.
 */
export function currentIds(): { uid: number; gid: number } {
  return { uid: process.getuid?.() ?? 0, gid: process.getgid?.() ?? 0 };
}
