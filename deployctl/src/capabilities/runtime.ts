import type { EnvironmentName } from "../types/trigger.js";
import { runCommand, tail } from "../core/exec.js";

export type ActivationRequest = {
  environment: EnvironmentName;
  /** Image reference to pull, pinned to the run's unique tag. */
  image: string;
  /** Materialized dotenv file for the environment. */
  envFile: string;
  signal?: AbortSignal;
};

export type ActivationResult = {
  activated: boolean;
  detail: string;
};

/**
 * The target environment's runtime: pulls the image and starts it with the
 * given configuration.
 */
export interface EnvironmentRuntime {
  activate(request: ActivationRequest): Promise<ActivationResult>;
}

export function substitutePlaceholders(argv: string[], request: ActivationRequest): string[] {
  const values: Record<string, string> = {
    image: request.image,
    env_file: request.envFile,
    environment: request.environment,
  };
  return argv.map((arg) => arg.replace(/\{(image|env_file|environment)\}/g, (_, name: string) => values[name] ?? ""));
}

/**
 * Runs the configured activation command (ssh, kubectl, docker compose...).
 * Without a command, activation is left to the environment and the stage only
 * reports the prepared image and configuration.
 */
export class CommandRuntime implements EnvironmentRuntime {
  constructor(
    private readonly command: string[] | undefined,
    private readonly opts: { cwd: string; env: NodeJS.ProcessEnv },
  ) {}

  async activate(request: ActivationRequest): Promise<ActivationResult> {
    if (!this.command) {
      return {
        activated: false,
        detail: `No activation command configured; ${request.image} and its configuration are ready for ${request.environment}`,
      };
    }

    const argv = substitutePlaceholders(this.command, request);
    const res = await runCommand(argv, { cwd: this.opts.cwd, env: this.opts.env, signal: request.signal });
    if (res.exitCode !== 0) {
      throw new Error(`Activation command exited with code ${res.exitCode}: ${tail(res.stderr || res.stdout, 10)}`);
    }
    return { activated: true, detail: `Activated ${request.image} in ${request.environment}` };
  }
}
