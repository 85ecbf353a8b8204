/**
 * `--init` — copy the bundled example profiles into the configuration directory.
 */

import type { Settings } from "../config/types";
import { type InitResult, initProfiles } from "../profiles/templates";

export async function runInit(settings: Settings, templatesDir?: string): Promise<InitResult> {
  return initProfiles(settings.configDir, templatesDir);
}

export function formatInitResult(result: InitResult): string {
  const lines: string[] = [];
  if (result.created.length > 0) {
    lines.push(`Created example configurations in ${result.configDir}:`);
    for (const name of result.created) lines.push(`  + ${name}`);
  }
  if (result.skipped.length > 0) {
    lines.push(`Kept existing files in ${result.configDir}:`);
    for (const name of result.skipped) lines.push(`  = ${name}`);
  }
  if (lines.length === 0) {
    lines.push(`No bundled templates to copy into ${result.configDir}`);
  }
  return lines.join("\n");
}
