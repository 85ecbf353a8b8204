/**
 * Alias file types.
 */

/** A parsed `alias=profile` record. `raw` is the line as read, kept for lossless rewrites. */
export interface AliasRecordLine {
  kind: "record";
  alias: string;
  target: string;
  raw?: string;
}

/** Comments, blank lines and lines that are not records; written back untouched. */
export interface AliasTextLine {
  kind: "text";
  raw: string;
}

export type AliasLine = AliasRecordLine | AliasTextLine;

export type AliasMap = Map<string, string>;

export type LineEnding = "\n" | "\r\n";

export interface AliasDocument {
  lines: AliasLine[];
  /** Line ending of the file as read, reused when it is written back */
  eol: LineEnding;
}

export interface SetAliasResult {
  alias: string;
  target: string;
  /** Target the alias pointed at before, when it already existed */
  previous?: string;
}
