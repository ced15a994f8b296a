/**
 * c2r-deploy Engine — Errors
 *
 * Expected external failures (a removal script or setup.exe returning a
 * non-zero code) are reported through DeploymentResult, not thrown.
 * DeploymentError is for conditions that stop a run before setup.exe starts.
 */

import { ErrorCategory } from "./types";
import { EXIT_BOOTSTRAP_FAILURE, EXIT_GENERIC_FAILURE } from "./windows/types";

const DEFAULT_EXIT_CODES: Record<ErrorCategory, number> = {
  VALIDATION_ERROR: EXIT_GENERIC_FAILURE,
  BOOTSTRAP_ERROR: EXIT_BOOTSTRAP_FAILURE,
  CONFIGURATION_ERROR: EXIT_GENERIC_FAILURE,
};

export class DeploymentError extends Error {
  readonly category: ErrorCategory;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
    exitCode: number = DEFAULT_EXIT_CODES[category],
  ) {
    super(message);
    this.name = "DeploymentError";
    this.category = category;
    this.exitCode = exitCode;
    this.details = details;
  }
}

/**
 * Exit code for anything that escaped to the outermost handler.
 */
export function exitCodeForError(err: unknown): number {
  return err instanceof DeploymentError ? err.exitCode : EXIT_GENERIC_FAILURE;
}
