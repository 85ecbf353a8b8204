/**
 * Alias resolver — maps a command-line name to a profile name.
 */

import type { AliasMap } from "./types";

export type Resolution =
  | { type: "alias"; alias: string; profile: string; }
  | { type: "name"; profile: string; };

export class AliasResolver {
  private aliases: AliasMap;

  constructor(aliases: AliasMap) {
    this.aliases = aliases;
  }

  /** An alias shadows a profile of the same name. */
  resolve(input: string): Resolution {
    const target = this.aliases.get(input);
    if (target !== undefined) return { type: "alias", alias: input, profile: target };
    return { type: "name", profile: input };
  }

  /** Aliases pointing at `profile`, in file order. */
  aliasesFor(profile: string): string[] {
    const result: string[] = [];
    for (const [alias, target] of this.aliases) {
      if (target === profile) result.push(alias);
    }
    return result;
  }

  getAliasNames(): string[] {
    return [...this.aliases.keys()];
  }

  entries(): Array<[string, string]> {
    return [...this.aliases.entries()];
  }
}
