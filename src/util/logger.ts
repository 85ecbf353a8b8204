/**
 * Stderr logger with verbosity control.
 * stdout carries listings and help only, so diagnostics never mix with them.
 */

const PREFIX = "aider-profiles";

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

export function log(message: string, ...args: unknown[]): void {
  if (verbose) {
    console.error(`[${PREFIX}] ${message}`, ...args);
  }
}

export function warn(message: string, ...args: unknown[]): void {
  console.error(`[${PREFIX} WARN] ${message}`, ...args);
}

export function error(message: string, ...args: unknown[]): void {
  console.error(`[${PREFIX} ERROR] ${message}`, ...args);
}
