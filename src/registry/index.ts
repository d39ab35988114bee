export { CheckRegistry, loadCheckRegistry } from "./check-registry.js";
export type { RegistryOptions } from "./check-registry.js";
export { createCustomCheck } from "./custom-checks.js";
export {
  loadProfileFile,
  loadProfiles,
  loadProfilesWithOverrides,
} from "./profile-loader.js";
export { validateProfile } from "./profile-validator.js";
export type {
  CustomCheckConfig,
  FileModeCustomCheck,
  ProfileDefinition,
  ProfileSummary,
  SshdOptionCustomCheck,
} from "./types.js";
