/**
 * Commander program for the `aider-profiles` command line.
 */

import { Command } from "commander";
import { resolveSettings } from "./config/settings";
import { formatInitResult, runInit } from "./commands/init";
import { collectListing, formatListing } from "./commands/list";
import { addAlias, formatAliasResult } from "./commands/alias";
import { type Launcher, runProfile } from "./commands/run";
import { signalExitCode } from "./launcher/spawn";
import { ProfileError } from "./util/errors";
import { setVerbose, warn } from "./util/logger";

export const VERSION = "0.1.0";

const EXAMPLES = `
Examples:
  $ aider-profiles --init                  # Create example configurations
  $ aider-profiles --list                  # List available configurations
  $ aider-profiles --alias g gemini-experimental
  $ aider-profiles g                       # Run aider with the 'g' configuration
  $ aider-profiles g file1.py file2.py     # Extra arguments go to aider unchanged`;

export interface ProgramOptions {
  /** Starts the assistant; replaced in tests */
  launch?: Launcher;
  templatesDir?: string;
  env?: Record<string, string | undefined>;
}

interface CliOptions {
  init?: boolean;
  list?: boolean;
  alias?: string[];
  dir?: string;
  verbose?: boolean;
}

export function createProgram(programOptions: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name("aider-profiles")
    .description("Manage named aider configurations and launch aider with them")
    .version(VERSION)
    .option("-i, --init", "Create example configurations")
    .option("-l, --list", "List available configurations and their aliases")
    .option("-a, --alias <alias-and-target...>", "Add ALIAS for configuration TARGET")
    .option("--dir <path>", "Configuration directory (default: ~/.config/aider-profiles)")
    .option("--verbose", "Verbose logging to stderr")
    .argument("[profile]", "Alias or configuration name to run")
    .argument("[args...]", "Arguments passed through to aider")
    .passThroughOptions()
    .addHelpText("after", EXAMPLES)
    .action(async (profile: string | undefined, args: string[], options: CliOptions) => {
      if (options.verbose) setVerbose(true);
      const settings = resolveSettings({ configDir: options.dir }, programOptions.env);

      if (options.init) {
        const result = await runInit(settings, programOptions.templatesDir);
        console.error(formatInitResult(result));
        return;
      }

      if (options.alias) {
        if (options.alias.length !== 2) {
          throw new ProfileError("INVALID_USAGE", "--alias takes exactly two values: ALIAS TARGET");
        }
        const [alias, target] = options.alias;
        const result = await addAlias(settings, alias, target);
        console.error(formatAliasResult(result));
        return;
      }

      if (options.list) {
        console.log(formatListing(await collectListing(settings)));
        return;
      }

      if (!profile) {
        program.outputHelp();
        return;
      }

      const code = await runProfile(settings, profile, args, programOptions.launch);
      if (code === signalExitCode("SIGINT")) {
        warn("Operation cancelled by user");
      }
      process.exitCode = code;
    });

  return program;
}
