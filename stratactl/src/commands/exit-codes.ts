import { CommanderError } from "commander";
import type { BootstrapErrorCode } from "../core/errors.js";

/**
 * CLI exit codes. Bootstrap failures use distinct sysexits-style codes;
 * after a successful launch the application's own code passes through.
 */
export const EXIT = {
  SUCCESS: 0,
  INVALID_ARGS: 64,
  LOCK_MISMATCH: 65,
  LAUNCH_ERROR: 69,
  UNEXPECTED: 70,
  INSTALL_IO_ERROR: 74,
  INTEGRITY_ERROR: 76,
  CONFIG_MISSING: 78,
} as const;

export function exitCodeFor(code: BootstrapErrorCode): number {
  return EXIT[code];
}

/**
 * Exit code for an error that escaped a command action. Usage errors from
 * argument parsing are INVALID_ARGS; help and version output exit cleanly.
 */
export function cliExitCode(err: unknown): number {
  if (err instanceof CommanderError) {
    return err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS;
  }
  return EXIT.UNEXPECTED;
}
