import type { PipelineError } from "../types/run.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RUN_FAILED: 1,
  CONFIG_ERROR: 2,
  INVALID_ARGS: 3,
  ENVIRONMENT_LOCKED: 4,
  APPROVAL_REJECTED: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(error: PipelineError): ExitCode {
  switch (error.code) {
    case "ENVIRONMENT_LOCKED":
      return EXIT.ENVIRONMENT_LOCKED;
    case "APPROVAL_DENIED":
    case "APPROVAL_TIMEOUT":
      return EXIT.APPROVAL_REJECTED;
  }
  return error.kind === "configuration" ? EXIT.CONFIG_ERROR : EXIT.RUN_FAILED;
}
