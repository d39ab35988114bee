export { ACCOUNT_CHECKS } from "./account-checks.js";
export { FILESYSTEM_CHECKS } from "./filesystem-checks.js";
export { SSH_CHECKS } from "./ssh-checks.js";
export { createFileModeFix, createFileModeProbe } from "./file-mode-probe.js";
export type { FileModeRule } from "./file-mode-probe.js";
export {
  createSshdOptionFix,
  createSshdOptionProbe,
  SSHD_CONFIG_PATH,
} from "./sshd-option-probe.js";
export type { SshdOptionRule, Verdict } from "./sshd-option-probe.js";
export { parseSshdConfig, setSshdOption } from "./sshd-config.js";
export {
  DEFAULT_WALK_EXCLUDES,
  readSystemFile,
  resolveSystemPath,
  statSystemPath,
  walkSystemTree,
} from "./system-reader.js";
