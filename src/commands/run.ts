/**
 * `<alias_or_name> [args...]` — resolve a profile and launch the assistant with it.
 */

import type { Settings } from "../config/types";
import { loadAliases } from "../alias/store";
import { AliasResolver, type Resolution } from "../alias/resolver";
import { getProfilePath, profileExists } from "../profiles/store";
import { launchAssistant, type LaunchOptions } from "../launcher/spawn";
import { ProfileError } from "../util/errors";
import { log } from "../util/logger";

export type Launcher = (options: LaunchOptions) => Promise<number>;

export interface ResolvedProfile {
  resolution: Resolution;
  path: string;
}

export async function resolveProfile(settings: Settings, input: string): Promise<ResolvedProfile> {
  const resolver = new AliasResolver(await loadAliases(settings.configDir));
  const resolution = resolver.resolve(input);
  const path = getProfilePath(settings.configDir, resolution.profile);

  if (!(await profileExists(settings.configDir, resolution.profile))) {
    const via = resolution.type === "alias" ? ` (alias for '${resolution.profile}')` : "";
    throw new ProfileError(
      "PROFILE_NOT_FOUND",
      `No configuration found for '${input}'${via}. Expected to find config file at: ${path}`,
    );
  }

  if (resolution.type === "alias") {
    log(`Alias '${input}' resolved to '${resolution.profile}'`);
  }
  return { resolution, path };
}

/** Returns the assistant's exit code unchanged. */
export async function runProfile(
  settings: Settings,
  input: string,
  extraArgs: string[] = [],
  launch: Launcher = launchAssistant,
): Promise<number> {
  const { path } = await resolveProfile(settings, input);
  return launch({
    command: settings.command,
    configFlag: settings.configFlag,
    configPath: path,
    extraArgs,
  });
}
