/**
 * Error type surfaced to the user by the CLI's top-level handler.
 */

export type ProfileErrorCode =
  | "CONFIG_DIR_UNREADABLE"
  | "ALIAS_TARGET_NOT_FOUND"
  | "INVALID_ALIAS"
  | "PROFILE_NOT_FOUND"
  | "EXECUTABLE_NOT_FOUND"
  | "INVALID_SETTINGS"
  | "INVALID_USAGE";

const EXIT_CODES: Record<ProfileErrorCode, number> = {
  CONFIG_DIR_UNREADABLE: 1,
  ALIAS_TARGET_NOT_FOUND: 1,
  INVALID_ALIAS: 1,
  PROFILE_NOT_FOUND: 1,
  // Same code a shell reports for a command it cannot find
  EXECUTABLE_NOT_FOUND: 127,
  INVALID_SETTINGS: 1,
  INVALID_USAGE: 1,
};

export class ProfileError extends Error {
  readonly code: ProfileErrorCode;

  constructor(code: ProfileErrorCode, message: string, options?: { cause?: unknown; }) {
    super(message, options);
    this.name = "ProfileError";
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export function isProfileError(err: unknown): err is ProfileError {
  return err instanceof ProfileError;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
