export {
  CONFIG_KEYS,
  configFromEnv,
  DEFAULT_CONFIG,
  loadConfigFile,
  loadScanConfig,
  resolveScanConfig,
} from "./scan-config.js";
export type { LoadConfigOptions, RawConfig, ScanConfig } from "./scan-config.js";
