import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { DeployctlConfig } from "../types/config.js";
import type { TriggerDescriptor } from "../types/trigger.js";
import type {
  ApprovalDecision,
  DeploymentRecord,
  PipelineError,
  PublishedArtifact,
  RunState,
  RunStatus,
  StageId,
  StageOutputValue,
  StageRecord,
} from "../types/run.js";
import type { ApprovalGate } from "../capabilities/approval.js";
import type { Logger } from "../log/logger.js";
import { appendProgress } from "../log/progress.js";
import { ArtifactWriter } from "../artifact-writer/writer.js";
import {
  STAGE_GRAPH,
  createStageRecords,
  evaluateStage,
  finalStatus,
  getStageTimeout,
  validateGraph,
  type StageDefinition,
} from "./state-machine.js";
import { checkEnvironmentLock } from "./concurrency.js";
import { executionError, toPipelineError } from "./errors.js";
import { runDirFor, saveRunState, statePathFor } from "./run-store.js";

export type StageContext = {
  run: Readonly<RunState>;
  config: DeployctlConfig;
  runDir: string;
  /** Private per-run directory for materialized configuration; removed when the run ends. */
  scratchDir: string;
  artifacts: ArtifactWriter;
  logger: Logger;
  signal: AbortSignal;
  timeoutMs: number;
};

export type StageOutcome =
  | {
      success: true;
      outputs?: Record<string, StageOutputValue>;
      artifact?: PublishedArtifact;
      deployment?: DeploymentRecord;
    }
  | { success: false; error: PipelineError; outputs?: Record<string, StageOutputValue> };

export type StageRunner = (stage: StageId, ctx: StageContext) => Promise<StageOutcome>;

export type OrchestratorDeps = {
  approval: ApprovalGate;
  logger: Logger;
  /** Schema name → version, recorded in the run manifest. */
  schemaVersions?: Record<string, string>;
};

export type RunResult = {
  success: boolean;
  run_id: string;
  status: RunStatus;
  failed_stage: StageId | null;
  error: PipelineError | null;
  stages: Record<StageId, StageRecord>;
  state_path: string;
};

const CANCELLED = "RUN_CANCELLED";
const SETTLE_GRACE_MS = 5000;

async function settleWithin(pending: Promise<unknown>, ms: number): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  await Promise.race([pending, new Promise<void>((resolve) => (timer = setTimeout(resolve, ms)))]);
  clearTimeout(timer);
}

/**
 * Drives one run through the stage graph.
 *
 * Stages run strictly in order. Each is gated on its dependencies and its
 * predicate; the first failure marks the run failed and every later stage is
 * recorded as skipped. State is persisted after every transition.
 */
export class Orchestrator {
  constructor(
    private readonly runsDir: string,
    private readonly config: DeployctlConfig,
    private readonly stageRunner: StageRunner,
    private readonly deps: OrchestratorDeps,
  ) {
    validateGraph(STAGE_GRAPH);
  }

  async run(opts: { runId: string; trigger: TriggerDescriptor; signal?: AbortSignal }): Promise<RunResult> {
    const runDir = runDirFor(this.runsDir, opts.runId);
    if (fs.existsSync(statePathFor(this.runsDir, opts.runId))) {
      throw new Error(`Run already exists: ${opts.runId}`);
    }

    const signal = opts.signal ?? new AbortController().signal;
    const logger = this.deps.logger.child({ runId: opts.runId });
    const now = new Date().toISOString();
    const state: RunState = {
      run_id: opts.runId,
      status: "pending",
      trigger: { ...opts.trigger },
      created_at: now,
      updated_at: now,
      finished_at: null,
      stages: createStageRecords(),
      artifact: null,
      deployment: null,
      failed_stage: null,
      error: null,
    };
    this.save(state);

    const artifacts = new ArtifactWriter(this.runsDir, opts.runId);
    artifacts.writeArtifact({ relativePath: "trigger.json", content: state.trigger, producedBy: "trigger-classifier" });

    const scratchDir = fs.mkdtempSync(path.join(os.tmpdir(), "deployctl-run-"));
    this.progress(state, `run started kind=${state.trigger.kind} env=${state.trigger.environment ?? "-"} commit=${state.trigger.commit}`);

    try {
      for (const def of STAGE_GRAPH) {
        const record = state.stages[def.id];

        if (signal.aborted && state.status !== "failed") {
          this.fail(state, def.id, executionError(CANCELLED, "Run cancelled before stage start", def.id));
          record.status = "skipped";
          record.skip_reason = "run cancelled";
          this.save(state);
          continue;
        }

        const decision = evaluateStage(def, state.trigger, state.stages);
        if (!decision.run) {
          record.status = "skipped";
          record.skip_reason = decision.reason;
          this.save(state);
          logger.info("STAGE_SKIPPED", `${def.id} skipped: ${decision.reason}`, { stage: def.id });
          this.progress(state, `stage=${def.id} skipped reason=${decision.reason}`);
          continue;
        }

        const ctx: StageContext = {
          run: state,
          config: this.config,
          runDir,
          scratchDir,
          artifacts,
          logger: logger.child({ stage: def.id }),
          signal,
          timeoutMs: getStageTimeout(def.id, this.config.timeouts) * 1000,
        };
        await this.runStage(def, state, ctx);
      }
    } finally {
      fs.rmSync(scratchDir, { recursive: true, force: true });
    }

    // A run cancelled between stages has no failed stage record but still failed.
    state.status = state.failed_stage !== null ? "failed" : finalStatus(state.stages);
    state.finished_at = new Date().toISOString();
    this.save(state);
    artifacts.writeManifest({
      commit: state.trigger.commit,
      environment: state.trigger.environment,
      schemaVersions: this.deps.schemaVersions ?? {},
    });

    if (state.status === "failed") {
      logger.error("RUN_FAILED", `Run failed at ${state.failed_stage ?? "?"}: ${state.error?.message ?? "unknown error"}`, {
        failedStage: state.failed_stage,
      });
    } else {
      logger.info(state.status === "succeeded" ? "RUN_SUCCEEDED" : "RUN_SKIPPED", `Run ${state.status}`);
    }
    this.progress(state, `run finished status=${state.status}`);

    return {
      success: state.status !== "failed",
      run_id: state.run_id,
      status: state.status,
      failed_stage: state.failed_stage,
      error: state.error,
      stages: state.stages,
      state_path: statePathFor(this.runsDir, state.run_id),
    };
  }

  private async runStage(def: StageDefinition, state: RunState, ctx: StageContext): Promise<void> {
    const record = state.stages[def.id];
    const logger = ctx.logger;

    state.status = def.runStatus;
    record.status = "running";
    record.started_at = new Date().toISOString();
    this.save(state);
    this.progress(state, `stage=${def.id} started`);
    const start = Date.now();

    let outcome: StageOutcome;
    const entry = await this.enterEnvironment(def, state, ctx);
    if (entry) {
      outcome = { success: false, error: entry };
    } else {
      logger.info("STAGE_STARTED", `${def.id} started`);
      outcome = await this.execute(def.id, ctx);
    }

    record.finished_at = new Date().toISOString();
    record.duration_ms = Date.now() - start;
    if (outcome.outputs) record.outputs = outcome.outputs;

    if (outcome.success) {
      record.status = "succeeded";
      if (outcome.artifact) state.artifact = outcome.artifact;
      if (outcome.deployment) state.deployment = outcome.deployment;
      logger.info("STAGE_SUCCEEDED", `${def.id} succeeded in ${record.duration_ms}ms`);
    } else {
      const error: PipelineError = { ...outcome.error, message: logger.redact(outcome.error.message), stage: def.id };
      record.status = "failed";
      record.error = error;
      this.fail(state, def.id, error);
      logger.error("STAGE_FAILED", `${def.id} failed: ${error.code}: ${error.message}`);
    }
    this.save(state);
    this.progress(state, `stage=${def.id} ${record.status}`);
  }

  /**
   * Environment gates checked before the deploy stage: the optional
   * environment lock, then approval. Returns the error that blocks entry.
   */
  private async enterEnvironment(def: StageDefinition, state: RunState, ctx: StageContext): Promise<PipelineError | null> {
    const environment = state.trigger.environment;
    if (def.id !== "deploy" || environment === null) return null;

    const lock = checkEnvironmentLock(
      this.runsDir,
      environment,
      this.config.concurrency.serialize_environments,
      state.run_id,
      { staleAfterMs: this.lockStaleAfterMs() },
    );
    if (!lock.allowed) {
      return executionError("ENVIRONMENT_LOCKED", lock.reason ?? `Environment "${environment}" is locked`, def.id);
    }

    if (!this.config.approval.required_environments.includes(environment)) return null;

    ctx.logger.info("APPROVAL_REQUESTED", `Waiting for approval to deploy to ${environment}`);
    this.progress(state, `stage=${def.id} awaiting approval env=${environment}`);
    let decision: ApprovalDecision;
    try {
      decision = await this.deps.approval.awaitApproval({ runId: state.run_id, environment, signal: ctx.signal });
    } catch (e) {
      if (ctx.signal.aborted) return executionError(CANCELLED, "Run cancelled while awaiting approval", def.id);
      return toPipelineError(e, def.id);
    }
    state.stages.deploy.approval = decision;
    this.save(state);

    if (decision === "granted") {
      ctx.logger.info("APPROVAL_GRANTED", `Deployment to ${environment} approved`);
      return null;
    }
    if (decision === "denied") {
      return executionError("APPROVAL_DENIED", `Deployment to ${environment} was denied`, def.id);
    }
    return executionError("APPROVAL_TIMEOUT", `No approval for ${environment} before the deadline`, def.id);
  }

  /** Longest a live run can go without writing its state while holding the lock. */
  private lockStaleAfterMs(): number {
    const { timeouts, approval } = this.config;
    const seconds = approval.timeout_seconds + getStageTimeout("deploy", timeouts) + getStageTimeout("verify", timeouts);
    return seconds * 1000 + SETTLE_GRACE_MS;
  }

  /** Run the stage under its timeout and the run's cancellation signal. */
  private async execute(stage: StageId, ctx: StageContext): Promise<StageOutcome> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const interrupted = new Promise<StageOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          success: false,
          error: executionError("STAGE_TIMEOUT", `Stage ${stage} exceeded ${ctx.timeoutMs}ms`, stage),
        });
      }, ctx.timeoutMs);
      onAbort = () => {
        controller.abort();
        resolve({ success: false, error: executionError(CANCELLED, `Run cancelled during ${stage}`, stage) });
      };
      if (ctx.signal.aborted) onAbort();
      else ctx.signal.addEventListener("abort", onAbort, { once: true });
    });

    const running = this.stageRunner(stage, { ...ctx, signal: controller.signal }).catch(
      (e: unknown): StageOutcome => ({ success: false, error: toPipelineError(e, stage) }),
    );

    try {
      return await Promise.race([running, interrupted]);
    } finally {
      clearTimeout(timer);
      if (onAbort) ctx.signal.removeEventListener("abort", onAbort);
      // Give the aborted stage a moment to kill its child process or request.
      if (controller.signal.aborted) await settleWithin(running, SETTLE_GRACE_MS);
    }
  }

  private fail(state: RunState, stage: StageId, error: PipelineError): void {
    state.status = "failed";
    if (state.failed_stage === null) {
      state.failed_stage = stage;
      state.error = error;
    }
  }

  private save(state: RunState): void {
    state.updated_at = new Date().toISOString();
    saveRunState(this.runsDir, state);
  }

  private progress(state: RunState, msg: string): void {
    appendProgress(runDirFor(this.runsDir, state.run_id), state.run_id, msg);
  }
}
