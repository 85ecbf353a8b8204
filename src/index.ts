/**
 * Programmatic API for aider-profiles.
 */

export { createProgram, VERSION, type ProgramOptions } from "./program";
export { resolveSettings, getDefaultConfigDir, ENV_KEYS } from "./config/settings";
export { validateSettings } from "./config/schema";
export type { Settings, SettingsOverrides } from "./config/types";
export {
  getAliasPath,
  loadAliases,
  parseAliasFile,
  serializeAliasFile,
  setAlias,
  validateAliasName,
} from "./alias/store";
export { AliasResolver, type Resolution } from "./alias/resolver";
export type { AliasLine, AliasMap, SetAliasResult } from "./alias/types";
export { getProfilePath, listProfiles, profileExists, type ProfileEntry } from "./profiles/store";
export { initProfiles, getTemplatesDir, type InitResult } from "./profiles/templates";
export { launchAssistant, buildArgs, type LaunchOptions } from "./launcher/spawn";
export { runInit } from "./commands/init";
export { collectListing, formatListing, type ListingResult } from "./commands/list";
export { addAlias } from "./commands/alias";
export { resolveProfile, runProfile, type Launcher } from "./commands/run";
export { ProfileError, type ProfileErrorCode } from "./util/errors";
export { setVerbose } from "./util/logger";
