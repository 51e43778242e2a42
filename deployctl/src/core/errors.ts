import type { PipelineError, StageId } from "../types/run.js";

/**
 * Raised for problems detected before or at stage entry: unknown environment,
 * invalid commit, missing secret, invalid configuration file.
 */
export class ConfigurationError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
  }
}

export function configurationError(code: string, message: string, stage?: StageId): PipelineError {
  return stage ? { kind: "configuration", code, message, stage } : { kind: "configuration", code, message };
}

export function executionError(code: string, message: string, stage?: StageId): PipelineError {
  return stage ? { kind: "execution", code, message, stage } : { kind: "execution", code, message };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Classify anything thrown out of a stage. */
export function toPipelineError(e: unknown, stage?: StageId): PipelineError {
  if (e instanceof ConfigurationError) return configurationError(e.code, e.message, stage);
  return executionError("STAGE_ERROR", errorMessage(e), stage);
}
