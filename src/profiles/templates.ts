/**
 * Example profiles shipped in templates/ and copied by `--init`.
 */

import { constants, existsSync } from "node:fs";
import { copyFile, readdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { ALIAS_FILE_NAME } from "../alias/store";
import { PROFILE_EXT, ensureConfigDir } from "./store";
import { ProfileError, isErrnoException } from "../util/errors";
import { log } from "../util/logger";

export interface InitResult {
  configDir: string;
  created: string[];
  skipped: string[];
}

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * templates/ sits at the package root: one level above dist/cli.js,
 * two levels above src/profiles/templates.ts.
 */
export function getTemplatesDir(): string {
  const candidates = [join(moduleDir, "..", "templates"), join(moduleDir, "..", "..", "templates")];
  return candidates.find(dir => existsSync(dir)) ?? candidates[0];
}

function isTemplateFile(name: string): boolean {
  return name.endsWith(PROFILE_EXT) || name === ALIAS_FILE_NAME;
}

export async function initProfiles(
  configDir: string,
  templatesDir: string = getTemplatesDir(),
): Promise<InitResult> {
  await ensureConfigDir(configDir);

  let names: string[];
  try {
    names = (await readdir(templatesDir)).filter(isTemplateFile).sort();
  } catch (err) {
    throw new ProfileError("CONFIG_DIR_UNREADABLE", `Cannot read bundled templates in ${templatesDir}`, {
      cause: err,
    });
  }

  const result: InitResult = { configDir, created: [], skipped: [] };
  for (const name of names) {
    const dest = join(configDir, name);
    try {
      // COPYFILE_EXCL refuses to replace a file the user already has
      await copyFile(join(templatesDir, name), dest, constants.COPYFILE_EXCL);
      log(`Created ${dest}`);
      result.created.push(name);
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        log(`Keeping existing ${dest}`);
        result.skipped.push(name);
        continue;
      }
      throw new ProfileError("CONFIG_DIR_UNREADABLE", `Cannot write ${dest}`, { cause: err });
    }
  }
  return result;
}
