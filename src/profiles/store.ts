/**
 * Profile store — the *.yml files in the configuration directory.
 * Profile contents are never parsed; only names and paths matter here.
 */

import { mkdir, readdir, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Dirent } from "node:fs";
import { ProfileError, isErrnoException } from "../util/errors";

export const PROFILE_EXT = ".yml";

export interface ProfileEntry {
  name: string;
  path: string;
}

export async function ensureConfigDir(configDir: string): Promise<void> {
  try {
    await mkdir(configDir, { recursive: true });
  } catch (err) {
    throw new ProfileError(
      "CONFIG_DIR_UNREADABLE",
      `Cannot create configuration directory ${configDir}`,
      { cause: err },
    );
  }
}

/** Names are bare file stems; anything that could leave the directory is rejected. */
export function isValidProfileName(name: string): boolean {
  return name !== ""
    && name !== "."
    && name !== ".."
    && !name.includes("/")
    && !name.includes("\\")
    && !name.includes("\0");
}

export function getProfilePath(configDir: string, name: string): string {
  return join(configDir, `${name}${PROFILE_EXT}`);
}

export async function profileExists(configDir: string, name: string): Promise<boolean> {
  if (!isValidProfileName(name)) return false;
  try {
    return (await stat(getProfilePath(configDir, name))).isFile();
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) return false;
    throw new ProfileError(
      "CONFIG_DIR_UNREADABLE",
      `Cannot read configuration directory ${configDir}`,
      { cause: err },
    );
  }
}

export async function listProfiles(configDir: string): Promise<ProfileEntry[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(configDir, { withFileTypes: true });
  } catch (err) {
    throw new ProfileError(
      "CONFIG_DIR_UNREADABLE",
      `Cannot read configuration directory ${configDir}`,
      { cause: err },
    );
  }

  return entries
    .filter(entry => entry.isFile() && entry.name.endsWith(PROFILE_EXT))
    .map(entry => {
      const name = basename(entry.name, PROFILE_EXT);
      return { name, path: join(configDir, entry.name) };
    })
    .filter(profile => profile.name !== "")
    .sort((a, b) => a.name.localeCompare(b.name));
}
