/**
 * Resolve settings.
 *
 * Precedence (later wins):
 * 1. built-in defaults
 * 2. AIDER_PROFILES_* environment variables (.env files are loaded by the CLI)
 * 3. CLI flags
 */

import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { ZodError } from "zod";
import { validateSettings } from "./schema";
import type { Settings, SettingsOverrides } from "./types";
import { expandPath } from "../util/env";
import { ProfileError } from "../util/errors";
import { log } from "../util/logger";

export const DEFAULT_COMMAND = "aider";
export const DEFAULT_CONFIG_FLAG = "--config";

export const ENV_KEYS = {
  configDir: "AIDER_PROFILES_DIR",
  command: "AIDER_PROFILES_COMMAND",
  configFlag: "AIDER_PROFILES_CONFIG_FLAG",
} as const;

export function getDefaultConfigDir(): string {
  return join(homedir(), ".config", "aider-profiles");
}

function pick(...values: Array<string | undefined>): string | undefined {
  return values.find(v => v !== undefined && v !== "");
}

export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: Record<string, string | undefined> = process.env,
): Settings {
  const rawDir = pick(overrides.configDir, env[ENV_KEYS.configDir]);
  const candidate = {
    configDir: rawDir ? resolve(expandPath(rawDir, env)) : getDefaultConfigDir(),
    command: pick(overrides.command, env[ENV_KEYS.command]) ?? DEFAULT_COMMAND,
    configFlag: pick(overrides.configFlag, env[ENV_KEYS.configFlag]) ?? DEFAULT_CONFIG_FLAG,
  };

  try {
    const settings = validateSettings(candidate);
    log(`Using configuration directory ${settings.configDir}`);
    return settings;
  } catch (err) {
    if (err instanceof ZodError) {
      const details = err.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new ProfileError("INVALID_SETTINGS", `Invalid settings: ${details}`, { cause: err });
    }
    throw err;
  }
}
