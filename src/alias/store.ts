/**
 * Alias store — persists aliases in <configDir>/aliases.txt.
 *
 * One `alias=profile` record per line. `#` comments and blank lines are
 * kept as written; records in the older `alias:profile` form are read too.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AliasDocument, AliasLine, AliasMap, AliasRecordLine, LineEnding, SetAliasResult } from "./types";
import { ProfileError, isErrnoException } from "../util/errors";
import { log } from "../util/logger";

export const ALIAS_FILE_NAME = "aliases.txt";

const ALIAS_NAME_RE = /^[^\s=:#-][^\s=:]*$/;

export function getAliasPath(configDir: string): string {
  return join(configDir, ALIAS_FILE_NAME);
}

export function validateAliasName(name: string): void {
  if (!ALIAS_NAME_RE.test(name)) {
    throw new ProfileError(
      "INVALID_ALIAS",
      `Invalid alias "${name}": use a non-empty name without spaces, "=" or ":" that does not start with "#" or "-"`,
    );
  }
}

function parseLine(raw: string): AliasLine {
  const line = raw.trim();
  if (line === "" || line.startsWith("#")) return { kind: "text", raw };

  let sep = line.indexOf("=");
  if (sep === -1) sep = line.indexOf(":");
  if (sep === -1) {
    log(`Ignoring alias line without separator: ${line}`);
    return { kind: "text", raw };
  }

  const alias = line.slice(0, sep).trim();
  const target = line.slice(sep + 1).trim();
  if (!alias || !target) {
    log(`Ignoring incomplete alias line: ${line}`);
    return { kind: "text", raw };
  }
  return { kind: "record", alias, target, raw };
}

export function parseAliasFile(content: string): AliasLine[] {
  if (content === "") return [];
  const rawLines = content.split(/\r?\n/);
  // A trailing newline does not start another line
  if (rawLines[rawLines.length - 1] === "") rawLines.pop();
  return rawLines.map(parseLine);
}

/** The file's first line break decides; new files use LF. */
export function detectLineEnding(content: string): LineEnding {
  const lf = content.indexOf("\n");
  return lf > 0 && content[lf - 1] === "\r" ? "\r\n" : "\n";
}

export function serializeAliasFile(lines: AliasLine[], eol: LineEnding = "\n"): string {
  if (lines.length === 0) return "";
  return lines
    .map(line => (line.kind === "text" ? line.raw : line.raw ?? `${line.alias}=${line.target}`))
    .join(eol) + eol;
}

/** Later records for the same alias win. */
export function toAliasMap(lines: AliasLine[]): AliasMap {
  const aliases: AliasMap = new Map();
  for (const line of lines) {
    if (line.kind === "record") aliases.set(line.alias, line.target);
  }
  return aliases;
}

export async function loadAliasDocument(configDir: string): Promise<AliasDocument> {
  const path = getAliasPath(configDir);
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return { lines: [], eol: "\n" };
    throw new ProfileError("CONFIG_DIR_UNREADABLE", `Cannot read alias file ${path}`, { cause: err });
  }
  return { lines: parseAliasFile(content), eol: detectLineEnding(content) };
}

export async function loadAliasLines(configDir: string): Promise<AliasLine[]> {
  return (await loadAliasDocument(configDir)).lines;
}

export async function loadAliases(configDir: string): Promise<AliasMap> {
  return toAliasMap(await loadAliasLines(configDir));
}

export async function saveAliasLines(
  configDir: string,
  lines: AliasLine[],
  eol: LineEnding = "\n",
): Promise<void> {
  const path = getAliasPath(configDir);
  try {
    await mkdir(configDir, { recursive: true });
    await writeFile(path, serializeAliasFile(lines, eol), "utf-8");
  } catch (err) {
    throw new ProfileError("CONFIG_DIR_UNREADABLE", `Cannot write alias file ${path}`, { cause: err });
  }
}

/**
 * Add or update an alias. The first record for the alias is rewritten in
 * place and any later duplicates are dropped; a new alias is appended.
 */
export function applyAlias(
  lines: AliasLine[],
  alias: string,
  target: string,
): { lines: AliasLine[]; previous?: string; } {
  const previous = toAliasMap(lines).get(alias);
  const record: AliasRecordLine = { kind: "record", alias, target };

  if (previous === undefined) {
    return { lines: [...lines, record] };
  }

  const next: AliasLine[] = [];
  let replaced = false;
  for (const line of lines) {
    if (line.kind === "record" && line.alias === alias) {
      if (!replaced) {
        // An unchanged target keeps the line exactly as the user wrote it
        next.push(line.target === target ? line : record);
        replaced = true;
      }
      continue;
    }
    next.push(line);
  }
  return { lines: next, previous };
}

export async function setAlias(
  configDir: string,
  alias: string,
  target: string,
): Promise<SetAliasResult> {
  validateAliasName(alias);
  const current = await loadAliasDocument(configDir);
  const { lines, previous } = applyAlias(current.lines, alias, target);
  await saveAliasLines(configDir, lines, current.eol);
  log(`Wrote ${getAliasPath(configDir)}`);
  return previous === undefined ? { alias, target } : { alias, target, previous };
}
