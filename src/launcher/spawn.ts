/**
 * Launch the coding assistant with a resolved profile and wait for it.
 */

import { spawn } from "node:child_process";
import { constants } from "node:os";
import { ProfileError, isErrnoException } from "../util/errors";
import { isVerbose, log } from "../util/logger";

export interface LaunchOptions {
  command: string;
  configFlag: string;
  configPath: string;
  /** Passed through after the config flag, unaltered and in order */
  extraArgs?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}


export function buildArgs(configFlag: string, configPath: string, extraArgs: string[] = []): string[] {
  return [configFlag, configPath, ...extraArgs];
}

/** Shell convention: a child killed by signal N exits with 128 + N. */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (constants.signals[signal] ?? 0);
}

/**
 * Resolves with the child's exit code. Rejects only when the process could
 * not be started.
 */
export function launchAssistant(options: LaunchOptions): Promise<number> {
  const { command, configFlag, configPath, extraArgs = [] } = options;
  const args = buildArgs(configFlag, configPath, extraArgs);
  if (isVerbose()) {
    // Arguments are quoted so empty or spaced ones stay visible
    log(`Spawning ${command} ${args.map(arg => JSON.stringify(arg)).join(" ")}`);
  }

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd ?? process.cwd(),
      env: options.env ?? process.env,
      stdio: "inherit",
      shell: false,
    });

    // Ctrl-C reaches the whole foreground process group, so the child already
    // has it. Holding SIGINT keeps the launcher alive until the child exits.
    const holdInterrupt = () => {
      log(`Interrupt received; waiting for ${command} to exit`);
    };
    // SIGTERM comes from outside the terminal and is only sent to us
    const forwardTerminate = () => {
      log(`Forwarding SIGTERM to ${command}`);
      child.kill("SIGTERM");
    };
    process.on("SIGINT", holdInterrupt);
    process.on("SIGTERM", forwardTerminate);
    const cleanup = () => {
      process.off("SIGINT", holdInterrupt);
      process.off("SIGTERM", forwardTerminate);
    };

    child.on("error", err => {
      cleanup();
      if (isErrnoException(err) && err.code === "ENOENT") {
        reject(
          new ProfileError(
            "EXECUTABLE_NOT_FOUND",
            `Command '${command}' not found. Install it or set AIDER_PROFILES_COMMAND`,
            { cause: err },
          ),
        );
      } else {
        reject(err);
      }
    });

    child.on("exit", (code, signal) => {
      cleanup();
      if (code !== null) {
        log(`${command} exited with code ${code}`);
        resolve(code);
      } else if (signal !== null) {
        log(`${command} terminated by ${signal}`);
        resolve(signalExitCode(signal));
      } else {
        resolve(0);
      }
    });
  });
}
