import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  STAGE_GRAPH,
  createStageRecords,
  evaluateStage,
  finalStatus,
  getStageTimeout,
  isTerminal,
  validateGraph,
} from "../src/core/state-machine.js";
import { checkEnvironmentLock } from "../src/core/concurrency.js";
import { ConfigurationError, executionError } from "../src/core/errors.js";
import { Orchestrator, type StageOutcome, type StageRunner } from "../src/core/orchestrator.js";
import { loadRunState, saveRunState } from "../src/core/run-store.js";
import { createMemoryLogger } from "../src/log/logger.js";
import type { RunState, RunStatus, StageId } from "../src/types/run.js";
import type { EnvironmentName, TriggerDescriptor } from "../src/types/trigger.js";
import type { DeployctlConfig } from "../src/types/config.js";
import { StaticApproval, testConfig } from "./helpers/fakes.js";

function manual(environment: EnvironmentName, commit = "a1b2c3d4e5f6"): TriggerDescriptor {
  return { kind: "manual", environment, commit, ref: "refs/heads/main", artifact_tag: commit };
}

const PUSH: TriggerDescriptor = { kind: "push", environment: null, commit: "a1b2c3d4e5f6", ref: "refs/heads/main", artifact_tag: "a1b2c3d4e5f6" };

function runState(runId: string, environment: EnvironmentName, status: RunStatus): RunState {
  const now = new Date().toISOString();
  return {
    run_id: runId,
    status,
    trigger: manual(environment),
    created_at: now,
    updated_at: now,
    finished_at: null,
    stages: createStageRecords(),
    artifact: null,
    deployment: null,
    failed_stage: null,
    error: null,
  };
}

/** Stage runner answering from a table; unlisted stages succeed. */
function scripted(table: Partial<Record<StageId, StageRunner>> = {}) {
  const calls: StageId[] = [];
  const runner: StageRunner = async (stage, ctx) => {
    calls.push(stage);
    const handler = table[stage];
    return handler ? handler(stage, ctx) : { success: true };
  };
  return { runner, calls };
}

/** Resolves only once the stage's signal is aborted. */
const waitForAbort: StageRunner = (stage, ctx) =>
  new Promise<StageOutcome>((resolve) => {
    const done = () => resolve({ success: false, error: executionError("ABORTED", "aborted", stage) });
    if (ctx.signal.aborted) done();
    else ctx.signal.addEventListener("abort", done);
  });

describe("state-machine", () => {
  it("orders stages test → build → deploy → verify", () => {
    expect(STAGE_GRAPH.map((s) => s.id)).toEqual(["test", "build", "deploy", "verify"]);
    expect(() => validateGraph(STAGE_GRAPH)).not.toThrow();
  });

  it("push triggers satisfy the test gate only", () => {
    const records = createStageRecords();
    expect(evaluateStage(STAGE_GRAPH[0], PUSH, records)).toEqual({ run: true });
    records.test.status = "succeeded";
    expect(evaluateStage(STAGE_GRAPH[1], PUSH, records)).toEqual({ run: false, reason: "gate not satisfied: manual dispatch only" });
    expect(evaluateStage(STAGE_GRAPH[1], manual("staging"), records)).toEqual({ run: true });
  });

  it("a stage whose dependency did not succeed is skipped", () => {
    const records = createStageRecords();
    records.test.status = "failed";
    expect(evaluateStage(STAGE_GRAPH[1], manual("staging"), records)).toEqual({ run: false, reason: 'dependency "test" failed' });
  });

  it("validateGraph rejects a dependency that does not run earlier", () => {
    expect(() => validateGraph([STAGE_GRAPH[1]])).toThrow('Stage "build" depends on "test", which does not run before it');
    expect(() => validateGraph([STAGE_GRAPH[0], STAGE_GRAPH[0]])).toThrow('Duplicate stage "test"');
  });

  it("finalStatus: failure wins over skip, skip over success", () => {
    const records = createStageRecords();
    for (const s of ["test", "build", "deploy", "verify"] as const) records[s].status = "succeeded";
    expect(finalStatus(records)).toBe("succeeded");
    records.verify.status = "skipped";
    expect(finalStatus(records)).toBe("skipped");
    records.deploy.status = "failed";
    expect(finalStatus(records)).toBe("failed");
  });

  it("isTerminal only for finished runs", () => {
    expect(isTerminal("succeeded")).toBe(true);
    expect(isTerminal("skipped")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("deploying")).toBe(false);
  });

  it("getStageTimeout falls back to defaults", () => {
    expect(getStageTimeout("test")).toBe(1800);
    expect(getStageTimeout("verify")).toBe(300);
    expect(getStageTimeout("deploy", { deploy: 42 })).toBe(42);
  });
});

describe("environment lock", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "deployctl-lock-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("is open for environments that are not serialized", () => {
    saveRunState(tmpDir, runState("other", "production", "deploying"));
    expect(checkEnvironmentLock(tmpDir, "production", [], "self")).toEqual({ allowed: true });
  });

  it("is held by a run deploying to the same environment", () => {
    saveRunState(tmpDir, runState("other", "production", "deploying"));
    expect(checkEnvironmentLock(tmpDir, "production", ["production"], "self")).toEqual({
      allowed: false,
      activeId: "other",
      reason: 'Environment "production" is locked by run other (status: deploying)',
    });
  });

  it("is not held by runs that are only building, or by other environments", () => {
    saveRunState(tmpDir, runState("builder", "production", "building"));
    saveRunState(tmpDir, runState("elsewhere", "staging", "verifying"));
    expect(checkEnvironmentLock(tmpDir, "production", ["production"], "self").allowed).toBe(true);
  });

  it("is released by a run that stopped writing its state", () => {
    const crashed = { ...runState("crashed", "production", "verifying"), updated_at: "2026-03-05T10:00:00.000Z" };
    saveRunState(tmpDir, crashed);
    const opts = { staleAfterMs: 60000 };

    expect(
      checkEnvironmentLock(tmpDir, "production", ["production"], "self", { ...opts, now: new Date("2026-03-05T10:00:30.000Z") })
        .allowed,
    ).toBe(false);
    expect(
      checkEnvironmentLock(tmpDir, "production", ["production"], "self", { ...opts, now: new Date("2026-03-05T10:01:01.000Z") }),
    ).toEqual({ allowed: true });
  });

  it("ignores the asking run itself", () => {
    saveRunState(tmpDir, runState("self", "production", "deploying"));
    expect(checkEnvironmentLock(tmpDir, "production", ["production"], "self").allowed).toBe(true);
  });
});

describe("Orchestrator", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "deployctl-orch-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function orchestrator(runner: StageRunner, opts: { config?: DeployctlConfig; approval?: StaticApproval } = {}) {
    const { logger, entries } = createMemoryLogger();
    const approval = opts.approval ?? new StaticApproval("granted");
    const orch = new Orchestrator(tmpDir, opts.config ?? testConfig(), runner, { approval, logger });
    return { orch, entries, approval };
  }

  it("push: runs the test stage and skips everything after it", async () => {
    const { runner, calls } = scripted();
    const { orch, entries } = orchestrator(runner);

    const res = await orch.run({ runId: "push-1", trigger: PUSH });

    expect(calls).toEqual(["test"]);
    expect(res.success).toBe(true);
    expect(res.status).toBe("skipped");
    expect(res.stages.test.status).toBe("succeeded");
    expect(res.stages.build).toMatchObject({ status: "skipped", skip_reason: "gate not satisfied: manual dispatch only" });
    expect(res.stages.deploy).toMatchObject({ status: "skipped", skip_reason: 'dependency "build" skipped' });
    expect(res.stages.verify).toMatchObject({ status: "skipped", skip_reason: 'dependency "deploy" skipped' });
    expect(entries.filter((e) => e.code === "STAGE_SKIPPED").map((e) => e.stage)).toEqual(["build", "deploy", "verify"]);
  });

  it("manual dispatch: runs every stage and persists the outcome", async () => {
    const artifact = {
      registry: "registry.test",
      repository: "example/mcp-server",
      tag: "a1b2c3d4e5f6",
      tags: ["registry.test/example/mcp-server:a1b2c3d4e5f6", "registry.test/example/mcp-server:latest"] as [string, string],
      image: "registry.test/example/mcp-server:a1b2c3d4e5f6",
      digest: "sha256:" + "1".repeat(64),
      reused: false,
    };
    const { runner, calls } = scripted({
      build: async () => ({ success: true, artifact, outputs: { image: artifact.image } }),
    });
    const { orch } = orchestrator(runner);

    const res = await orch.run({ runId: "manual-staging-1", trigger: manual("staging") });

    expect(calls).toEqual(["test", "build", "deploy", "verify"]);
    expect(res.status).toBe("succeeded");
    expect(res.failed_stage).toBeNull();

    const saved = loadRunState(tmpDir, "manual-staging-1");
    expect(saved?.status).toBe("succeeded");
    expect(saved?.artifact).toEqual(artifact);
    expect(saved?.stages.build.outputs).toEqual({ image: artifact.image });
    expect(saved?.finished_at).not.toBeNull();

    const runDir = path.join(tmpDir, "manual-staging-1");
    const manifest = JSON.parse(fs.readFileSync(path.join(runDir, "manifest.json"), "utf8"));
    expect(manifest.artifacts.map((a: { path: string }) => a.path)).toEqual(["trigger.json"]);
    const progress = fs.readFileSync(path.join(runDir, "progress.log"), "utf8").trim().split("\n");
    expect(progress[progress.length - 1]).toMatch(/runId=manual-staging-1 run finished status=succeeded$/);
  });

  it("a failed test stage halts the run", async () => {
    const { runner, calls } = scripted({
      test: async () => ({ success: false, error: executionError("TEST_FAILED", "exit 1", "test") }),
    });
    const { orch } = orchestrator(runner);

    const res = await orch.run({ runId: "r1", trigger: manual("staging") });

    expect(calls).toEqual(["test"]);
    expect(res.success).toBe(false);
    expect(res.status).toBe("failed");
    expect(res.failed_stage).toBe("test");
    expect(res.error).toEqual({ kind: "execution", code: "TEST_FAILED", message: "exit 1", stage: "test" });
    expect(res.stages.build).toMatchObject({ status: "skipped", skip_reason: 'dependency "test" failed' });
    expect(res.stages.verify.status).toBe("skipped");
  });

  it("an exception from a stage fails that stage", async () => {
    const { runner } = scripted({
      build: async () => {
        throw new Error("buildx exploded");
      },
    });
    const { orch } = orchestrator(runner);

    const res = await orch.run({ runId: "r1", trigger: manual("development") });

    expect(res.failed_stage).toBe("build");
    expect(res.error).toEqual({ kind: "execution", code: "STAGE_ERROR", message: "buildx exploded", stage: "build" });
    expect(res.stages.deploy.status).toBe("skipped");
  });

  it("configuration errors keep their kind and code", async () => {
    const { runner } = scripted({
      deploy: async () => {
        throw new ConfigurationError("MISSING_SECRET", 'Missing secret(s) for environment "staging": DATABASE_URL');
      },
    });
    const { orch } = orchestrator(runner);

    const res = await orch.run({ runId: "r1", trigger: manual("staging") });

    expect(res.error).toEqual({
      kind: "configuration",
      code: "MISSING_SECRET",
      message: 'Missing secret(s) for environment "staging": DATABASE_URL',
      stage: "deploy",
    });
  });

  it("redacts registered secrets from stage errors", async () => {
    const { runner } = scripted({
      deploy: async (_stage, ctx) => {
        ctx.logger.addSecret("test-secret-value");
        return { success: false, error: executionError("DEPLOY_FAILED", "connect failed for postgres://app:test-secret-value@db") };
      },
    });
    const { orch } = orchestrator(runner);

    const res = await orch.run({ runId: "r1", trigger: manual("staging") });

    expect(res.error?.message).toBe("connect failed for postgres://app:***@db");
    expect(fs.readFileSync(path.join(tmpDir, "r1", "state.json"), "utf8")).not.toContain("test-secret-value");
  });

  it("production waits for approval before deploying", async () => {
    const { runner, calls } = scripted();
    const { orch, approval } = orchestrator(runner, { approval: new StaticApproval("granted") });

    const res = await orch.run({ runId: "prod-1", trigger: manual("production") });

    expect(calls).toEqual(["test", "build", "deploy", "verify"]);
    expect(approval.requests.map((r) => [r.runId, r.environment])).toEqual([["prod-1", "production"]]);
    expect(res.stages.deploy.approval).toBe("granted");
    expect(res.status).toBe("succeeded");
  });

  it("staging deploys without asking for approval", async () => {
    const { runner } = scripted();
    const { orch, approval } = orchestrator(runner);

    await orch.run({ runId: "r1", trigger: manual("staging") });

    expect(approval.requests).toHaveLength(0);
  });

  it("denied approval fails deploy without running it", async () => {
    const { runner, calls } = scripted();
    const { orch } = orchestrator(runner, { approval: new StaticApproval("denied") });

    const res = await orch.run({ runId: "prod-1", trigger: manual("production") });

    expect(calls).toEqual(["test", "build"]);
    expect(res.failed_stage).toBe("deploy");
    expect(res.error).toEqual({ kind: "execution", code: "APPROVAL_DENIED", message: "Deployment to production was denied", stage: "deploy" });
    expect(res.stages.deploy.approval).toBe("denied");
    expect(res.stages.verify).toMatchObject({ status: "skipped", skip_reason: 'dependency "deploy" failed' });
  });

  it("approval timeout fails deploy", async () => {
    const { runner, calls } = scripted();
    const { orch } = orchestrator(runner, { approval: new StaticApproval("timeout") });

    const res = await orch.run({ runId: "prod-1", trigger: manual("production") });

    expect(calls).toEqual(["test", "build"]);
    expect(res.error?.code).toBe("APPROVAL_TIMEOUT");
    expect(res.error?.message).toBe("No approval for production before the deadline");
  });

  it("a serialized environment blocks a second deploy", async () => {
    saveRunState(tmpDir, runState("other-run", "staging", "deploying"));
    const { runner, calls } = scripted();
    const config = testConfig({ concurrency: { serialize_environments: ["staging"] } });
    const { orch } = orchestrator(runner, { config });

    const res = await orch.run({ runId: "r2", trigger: manual("staging") });

    expect(calls).toEqual(["test", "build"]);
    expect(res.error).toEqual({
      kind: "execution",
      code: "ENVIRONMENT_LOCKED",
      message: 'Environment "staging" is locked by run other-run (status: deploying)',
      stage: "deploy",
    });
  });

  it("a run that died mid-deploy long ago does not block a serialized environment", async () => {
    saveRunState(tmpDir, { ...runState("crashed-run", "staging", "deploying"), updated_at: "2020-01-01T00:00:00.000Z" });
    const { runner, calls } = scripted();
    const config = testConfig({ concurrency: { serialize_environments: ["staging"] } });
    const { orch } = orchestrator(runner, { config });

    const res = await orch.run({ runId: "r3", trigger: manual("staging") });

    expect(res.status).toBe("succeeded");
    expect(calls).toEqual(["test", "build", "deploy", "verify"]);
  });

  it("a stage that exceeds its timeout fails and is aborted", async () => {
    let aborted = false;
    const { runner } = scripted({
      build: async (stage, ctx) => {
        const outcome = await waitForAbort(stage, ctx);
        aborted = ctx.signal.aborted;
        return outcome;
      },
    });
    const { orch } = orchestrator(runner, { config: testConfig({ timeouts: { build: 1 } }) });

    const res = await orch.run({ runId: "r1", trigger: manual("staging") });

    expect(aborted).toBe(true);
    expect(res.error).toEqual({ kind: "execution", code: "STAGE_TIMEOUT", message: "Stage build exceeded 1000ms", stage: "build" });
    expect(res.stages.deploy.status).toBe("skipped");
  });

  it("cancellation aborts the current stage and runs nothing after it", async () => {
    const controller = new AbortController();
    const { runner, calls } = scripted({
      test: async (stage, ctx) => {
        controller.abort();
        return waitForAbort(stage, ctx);
      },
    });
    const { orch } = orchestrator(runner);

    const res = await orch.run({ runId: "r1", trigger: manual("staging"), signal: controller.signal });

    expect(calls).toEqual(["test"]);
    expect(res.status).toBe("failed");
    expect(res.error).toEqual({ kind: "execution", code: "RUN_CANCELLED", message: "Run cancelled during test", stage: "test" });
    expect(res.stages.build).toMatchObject({ status: "skipped", skip_reason: 'dependency "test" failed' });
  });

  it("a run cancelled before it starts fails without running a stage", async () => {
    const controller = new AbortController();
    controller.abort();
    const { runner, calls } = scripted();
    const { orch } = orchestrator(runner);

    const res = await orch.run({ runId: "r1", trigger: manual("staging"), signal: controller.signal });

    expect(calls).toEqual([]);
    expect(res.status).toBe("failed");
    expect(res.failed_stage).toBe("test");
    expect(res.error?.code).toBe("RUN_CANCELLED");
    expect(res.stages.test).toMatchObject({ status: "skipped", skip_reason: "run cancelled" });
  });

  it("removes the scratch directory when the run ends", async () => {
    let scratch = "";
    const { runner } = scripted({
      test: async (_stage, ctx) => {
        scratch = ctx.scratchDir;
        fs.writeFileSync(path.join(ctx.scratchDir, "test.env"), "DATABASE_URL=sqlite:///./test.db\n");
        return { success: true };
      },
    });
    const { orch } = orchestrator(runner);

    await orch.run({ runId: "r1", trigger: PUSH });

    expect(scratch).not.toBe("");
    expect(fs.existsSync(scratch)).toBe(false);
  });

  it("refuses to reuse a run id", async () => {
    const { runner } = scripted();
    const { orch } = orchestrator(runner);
    await orch.run({ runId: "r1", trigger: PUSH });

    await expect(orch.run({ runId: "r1", trigger: PUSH })).rejects.toThrow("Run already exists: r1");
  });
});
