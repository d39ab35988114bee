import type { ProbeResult } from "./types.js";

export function pass(message: string): ProbeResult {
  return { kind: "success", message };
}

export function fail(message: string): ProbeResult {
  return { kind: "failure", degree: "hard", message };
}

export function warn(message: string): ProbeResult {
  return { kind: "failure", degree: "soft", message };
}

export function probeError(message: string): ProbeResult {
  return { kind: "error", message };
}
