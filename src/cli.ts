#!/usr/bin/env node
/**
 * aider-profiles — named aider configurations with short aliases
 *
 * Usage:
 *   aider-profiles --init                 Create example configurations
 *   aider-profiles --list                 List configurations and aliases
 *   aider-profiles --alias ALIAS TARGET   Register an alias
 *   aider-profiles <alias> [args...]      Run aider with that configuration
 */

import { config } from "dotenv";
import { createProgram } from "./program";
import { errorMessage, isProfileError } from "./util/errors";
import { error as logError } from "./util/logger";

// Real environment variables win over both files
config({ path: ".env.local", quiet: true });
config({ path: ".env", quiet: true });

async function main(): Promise<void> {
  await createProgram().parseAsync();
}

main().catch(err => {
  logError(errorMessage(err));
  process.exit(isProfileError(err) ? err.exitCode : 1);
});
