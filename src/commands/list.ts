/**
 * `--list` — configurations with the aliases that point at them.
 */

import type { Settings } from "../config/types";
import { loadAliases } from "../alias/store";
import { AliasResolver } from "../alias/resolver";
import { ensureConfigDir, listProfiles } from "../profiles/store";

export interface ListingResult {
  configDir: string;
  profiles: Array<{ name: string; path: string; aliases: string[]; }>;
  /** Aliases whose target has no .yml file */
  dangling: Array<{ alias: string; target: string; }>;
}

export async function collectListing(settings: Settings): Promise<ListingResult> {
  await ensureConfigDir(settings.configDir);
  const profiles = await listProfiles(settings.configDir);
  const resolver = new AliasResolver(await loadAliases(settings.configDir));

  const known = new Set(profiles.map(p => p.name));
  const dangling = resolver
    .entries()
    .filter(([, target]) => !known.has(target))
    .map(([alias, target]) => ({ alias, target }));

  return {
    configDir: settings.configDir,
    profiles: profiles.map(p => ({ ...p, aliases: resolver.aliasesFor(p.name) })),
    dangling,
  };
}

export function formatListing(result: ListingResult): string {
  const lines: string[] = [];

  if (result.profiles.length === 0) {
    lines.push(`No configurations found in ${result.configDir}. Run with --init to create examples.`);
  }
  for (const profile of result.profiles) {
    const aliases = profile.aliases.length > 0 ? ` (aliases: ${profile.aliases.join(", ")})` : "";
    lines.push(`${profile.name}: ${profile.path}${aliases}`);
  }

  if (result.dangling.length > 0) {
    lines.push("");
    lines.push("Dangling aliases:");
    for (const { alias, target } of result.dangling) {
      lines.push(`  ${alias} -> ${target} (missing)`);
    }
  }

  return lines.join("\n");
}
