import { UnknownSpeciesError } from "../errors/UnknownSpeciesError.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PROVISION_FAILED: 1,
  UNKNOWN_SPECIES: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof UnknownSpeciesError ? EXIT.UNKNOWN_SPECIES : EXIT.PROVISION_FAILED;
}

export type CommandFailure = { ok: false; error: string; exitCode: ExitCode };

export function failure(error: unknown): CommandFailure {
  return { ok: false, error: error instanceof Error ? error.message : String(error), exitCode: exitCodeFor(error) };
}
