/**
 * `--alias ALIAS TARGET` — register or update an alias for an existing profile.
 */

import type { Settings } from "../config/types";
import type { SetAliasResult } from "../alias/types";
import { setAlias, validateAliasName } from "../alias/store";
import { getProfilePath, profileExists } from "../profiles/store";
import { ProfileError } from "../util/errors";

export async function addAlias(
  settings: Settings,
  alias: string,
  target: string,
): Promise<SetAliasResult> {
  validateAliasName(alias);

  // Checked before touching aliases.txt so a failed add leaves it as it was
  if (!(await profileExists(settings.configDir, target))) {
    throw new ProfileError(
      "ALIAS_TARGET_NOT_FOUND",
      `Configuration '${target}' not found (expected ${getProfilePath(settings.configDir, target)})`,
    );
  }

  return setAlias(settings.configDir, alias, target);
}

export function formatAliasResult(result: SetAliasResult): string {
  if (result.previous !== undefined && result.previous !== result.target) {
    return `Alias updated: ${result.alias} -> ${result.target} (was ${result.previous})`;
  }
  return `Alias set: ${result.alias} -> ${result.target}`;
}
