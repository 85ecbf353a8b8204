/**
 * Expand ${VAR} references and a leading ~ in path settings.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { warn } from "./logger";

const ENV_VAR_RE = /\$\{([^}]+)\}/g;

export function expandEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return value.replace(ENV_VAR_RE, (_, varName: string) => {
    if (!(varName in env)) {
      warn(`Environment variable '${varName}' is not set; expanding to an empty string`);
    }
    return env[varName] ?? "";
  });
}

export function expandHome(value: string): string {
  if (value === "~") return homedir();
  if (value.startsWith("~/")) return join(homedir(), value.slice(2));
  return value;
}

export function expandPath(
  value: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return expandHome(expandEnvVars(value, env));
}
