import path from "node:path";
import type { DeployctlConfig } from "../types/config.js";
import type { PipelineError } from "../types/run.js";
import type { TriggerEvent } from "../types/trigger.js";
import type { ApprovalGate } from "../capabilities/approval.js";
import { FileApprovalGate } from "../capabilities/approval.js";
import { DockerCliRegistry } from "../capabilities/registry.js";
import { CommandRuntime } from "../capabilities/runtime.js";
import { HttpProbe } from "../capabilities/probe.js";
import { createSecretResolver } from "../capabilities/secrets.js";
import { loadConfig } from "../config/loader.js";
import { ConfigurationError, configurationError, errorMessage, executionError } from "../core/errors.js";
import { Orchestrator, type RunResult } from "../core/orchestrator.js";
import { claimRunId } from "../core/run-id.js";
import { createStageRunner, type PipelineServices } from "../core/stage-runner.js";
import { classifyTrigger } from "../core/trigger-classifier.js";
import { createLogger, type LogFormat, type Logger } from "../log/logger.js";
import { sanitizeEnv } from "../log/redact.js";
import { createRegistry } from "../schema/registry.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type PipelineCommandOptions = {
  /** Directory holding base.yaml and the environment overlays. */
  configDir?: string;
  /** Overrides `runs_dir` from the configuration. */
  runsDir?: string;
  /** Repository the pipeline acts on (default: cwd). */
  repoPath?: string;
  format?: LogFormat;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  /** Replaces the default docker, runtime, probe and approval implementations. */
  services?: Partial<Omit<PipelineServices, "repoPath">> & { approval?: ApprovalGate };
};

export type PipelineCommandResult =
  | { ok: true; outcome: "ignored"; reason: string }
  | { ok: true; outcome: "completed"; run: RunResult }
  | { ok: false; error: PipelineError; exitCode: ExitCode; run?: RunResult };

function configFailure(e: unknown): PipelineCommandResult {
  if (e instanceof ConfigurationError) {
    return { ok: false, exitCode: EXIT.CONFIG_ERROR, error: configurationError(e.code, e.message) };
  }
  return { ok: false, exitCode: EXIT.CONFIG_ERROR, error: configurationError("CONFIG_READ_FAILED", errorMessage(e)) };
}

/**
 * Classify an event and, unless it is ignored, drive one run to completion.
 * Configuration is loaded twice: the base layers decide the trigger, then the
 * target environment's overlay applies to the run itself.
 */
export async function executeEvent(event: TriggerEvent, opts: PipelineCommandOptions = {}): Promise<PipelineCommandResult> {
  const env = opts.env ?? process.env;
  const repoPath = path.resolve(opts.repoPath ?? process.cwd());
  const logger = opts.logger ?? createLogger(opts.format ?? "human");

  let config: DeployctlConfig;
  try {
    config = await loadConfig(undefined, opts.configDir, env);
  } catch (e) {
    return configFailure(e);
  }

  const classified = classifyTrigger(event, config.trigger);
  if (classified.outcome === "ignored") {
    logger.info("TRIGGER_IGNORED", classified.reason);
    return { ok: true, outcome: "ignored", reason: classified.reason };
  }
  if (classified.outcome === "invalid") {
    logger.error(classified.error.code, classified.error.message);
    return { ok: false, exitCode: exitCodeFor(classified.error), error: classified.error };
  }

  const trigger = classified.trigger;
  if (trigger.environment !== null) {
    try {
      config = await loadConfig(trigger.environment, opts.configDir, env);
    } catch (e) {
      return configFailure(e);
    }
  }

  const runsDir = path.resolve(repoPath, opts.runsDir ?? config.runs_dir);
  let runId: string;
  try {
    runId = claimRunId(trigger, runsDir);
  } catch (e) {
    const error = executionError("RUN_CREATE_FAILED", `Could not create a run directory under ${runsDir}: ${errorMessage(e)}`);
    logger.error(error.code, error.message);
    return { ok: false, exitCode: exitCodeFor(error), error };
  }
  const schemas = await createRegistry();
  const services = defaultServices(config, repoPath, env, logger, opts.services);

  const orchestrator = new Orchestrator(runsDir, config, createStageRunner(services), {
    approval: opts.services?.approval ?? defaultApproval(config, runsDir),
    logger,
    schemaVersions: schemas.versions(),
  });

  logger.info("RUN_CREATED", `Run ${runId} (${trigger.kind}, ${trigger.environment ?? "no environment"}, ${trigger.commit})`, {
    runId,
  });
  let run: RunResult;
  try {
    run = await orchestrator.run({ runId, trigger, signal: opts.signal });
  } catch (e) {
    const error = executionError("RUN_CREATE_FAILED", errorMessage(e));
    logger.error(error.code, error.message, { runId });
    return { ok: false, exitCode: exitCodeFor(error), error };
  }

  if (!run.success) {
    const error = run.error ?? executionError("RUN_FAILED", `Run ${run.run_id} failed`);
    return { ok: false, exitCode: exitCodeFor(error), error, run };
  }
  return { ok: true, outcome: "completed", run };
}

function defaultApproval(config: DeployctlConfig, runsDir: string): ApprovalGate {
  return new FileApprovalGate(runsDir, {
    timeoutMs: config.approval.timeout_seconds * 1000,
    pollIntervalMs: config.approval.poll_interval_ms,
  });
}

function defaultServices(
  config: DeployctlConfig,
  repoPath: string,
  env: NodeJS.ProcessEnv,
  logger: Logger,
  overrides: PipelineCommandOptions["services"] = {},
): PipelineServices {
  const childEnv = sanitizeEnv(env);
  const username = config.image.username_env ? env[config.image.username_env] : undefined;
  const token = config.image.token_env ? env[config.image.token_env] : undefined;
  if (token) logger.addSecret(token);

  return {
    repoPath,
    baseEnv: overrides.baseEnv ?? childEnv,
    registry:
      overrides.registry ??
      new DockerCliRegistry({ registry: config.image.registry, cwd: repoPath, env: childEnv, username, token }),
    secrets: overrides.secrets ?? createSecretResolver(config.secrets, repoPath, env),
    runtime: overrides.runtime ?? new CommandRuntime(config.deploy.command, { cwd: repoPath, env: childEnv }),
    probe: overrides.probe ?? new HttpProbe(config.verify.probe_timeout_ms),
    sleep: overrides.sleep,
  };
}

/** Details the caller did not pass are read from git; without a repository the arguments are incomplete. */
export function gitFailure(e: unknown): PipelineCommandResult {
  const message = e instanceof Error ? e.message : String(e);
  return {
    ok: false,
    exitCode: EXIT.INVALID_ARGS,
    error: configurationError("GIT_UNAVAILABLE", `Could not read commit details from git: ${message.trim()}`),
  };
}
