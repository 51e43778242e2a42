import type { StageId, StageOutputValue } from "../types/run.js";
import type { EnvironmentName } from "../types/trigger.js";
import type { ContainerRegistry } from "../capabilities/registry.js";
import type { SecretResolver } from "../capabilities/secrets.js";
import type { EnvironmentRuntime } from "../capabilities/runtime.js";
import type { Probe, ProbeResult } from "../capabilities/probe.js";
import type { StageContext, StageOutcome, StageRunner } from "./orchestrator.js";
import { executionError } from "./errors.js";
import { runTestStage } from "./steps/test.js";
import { runBuildStage } from "./steps/build.js";
import { runDeployStage } from "./steps/deploy.js";
import { runVerifyStage, type Sleep } from "./steps/verify.js";

/** External capabilities the stages act through. */
export type PipelineServices = {
  /** Checkout of the commit under test; commands and the build context resolve against it. */
  repoPath: string;
  /** Environment handed to test commands before the synthetic configuration is layered on. */
  baseEnv: NodeJS.ProcessEnv;
  registry: ContainerRegistry;
  secrets: SecretResolver;
  runtime: EnvironmentRuntime;
  probe: Probe;
  sleep?: Sleep;
};

export function createStageRunner(services: PipelineServices): StageRunner {
  return async (stage, ctx) => {
    switch (stage) {
      case "test":
        return testStage(services, ctx);
      case "build":
        return buildStage(services, ctx);
      case "deploy":
        return deployStage(services, ctx);
      case "verify":
        return verifyStage(services, ctx);
    }
  };
}

function requireEnvironment(stage: StageId, ctx: StageContext): EnvironmentName {
  const environment = ctx.run.trigger.environment;
  if (environment === null) {
    throw new Error(`Stage ${stage} needs a target environment`);
  }
  return environment;
}

async function testStage(services: PipelineServices, ctx: StageContext): Promise<StageOutcome> {
  const result = await runTestStage({
    config: ctx.config.test,
    repoPath: services.repoPath,
    scratchDir: ctx.scratchDir,
    baseEnv: services.baseEnv,
    logger: ctx.logger,
    signal: ctx.signal,
    timeoutMs: ctx.timeoutMs,
  });

  const outputs: Record<string, StageOutputValue> = { command: result.command, exit_code: result.exit_code };
  if (result.report) {
    ctx.artifacts.writeArtifact({
      relativePath: "artifacts/test-report.json",
      content: result.report,
      schema: "test-result",
      producedBy: "stage:test",
      sourceFormat: result.report.source_format,
    });
    outputs.tests_total = result.report.result.total;
    outputs.tests_failed = result.report.result.failed;
  }

  if (!result.pass) {
    if (result.output_tail) ctx.logger.warn("TEST_OUTPUT", result.output_tail);
    return {
      success: false,
      outputs,
      error: executionError("TEST_FAILED", `Command "${result.command}" exited with code ${result.exit_code}`, "test"),
    };
  }
  return { success: true, outputs };
}

async function buildStage(services: PipelineServices, ctx: StageContext): Promise<StageOutcome> {
  const artifact = await runBuildStage({
    trigger: ctx.run.trigger,
    image: ctx.config.image,
    registry: services.registry,
    repoPath: services.repoPath,
    logger: ctx.logger,
    signal: ctx.signal,
  });

  ctx.artifacts.writeArtifact({ relativePath: "artifacts/image.json", content: artifact, producedBy: "stage:build" });
  return {
    success: true,
    artifact,
    outputs: { image: artifact.image, digest: artifact.digest, reused: artifact.reused },
  };
}

async function deployStage(services: PipelineServices, ctx: StageContext): Promise<StageOutcome> {
  const environment = requireEnvironment("deploy", ctx);
  const artifact = ctx.run.artifact;
  if (!artifact) {
    return { success: false, error: executionError("ARTIFACT_MISSING", "No published image to deploy", "deploy") };
  }

  const result = await runDeployStage({
    environment,
    artifact,
    service: ctx.config.service,
    secrets: services.secrets,
    requiredLater: [ctx.config.verify.base_url_secret],
    runtime: services.runtime,
    scratchDir: ctx.scratchDir,
    logger: ctx.logger,
    signal: ctx.signal,
  });

  // Only the record goes to disk; the materialized configuration holds secrets.
  ctx.artifacts.writeArtifact({
    relativePath: "artifacts/deployment.json",
    content: result.deployment,
    producedBy: "stage:deploy",
  });
  return {
    success: true,
    deployment: result.deployment,
    outputs: { image: result.deployment.image, activated: result.deployment.activated },
  };
}

function describeProbe(probe: ProbeResult): string {
  return probe.status === null ? (probe.error ?? "no response") : `HTTP ${probe.status}`;
}

function probeRecord(probePath: string, probe: ProbeResult) {
  return { path: probePath, ok: probe.ok, status: probe.status, duration_ms: probe.duration_ms, error: probe.error ?? null };
}

async function verifyStage(services: PipelineServices, ctx: StageContext): Promise<StageOutcome> {
  const environment = requireEnvironment("verify", ctx);
  const result = await runVerifyStage({
    environment,
    config: ctx.config.verify,
    secrets: services.secrets,
    probe: services.probe,
    logger: ctx.logger,
    sleep: services.sleep,
    signal: ctx.signal,
  });

  // The base URL is itself a secret; the artifact records paths only.
  const { liveness_path, smoke_path } = ctx.config.verify;
  ctx.artifacts.writeArtifact({
    relativePath: "artifacts/verify.json",
    content: {
      pass: result.pass,
      liveness: probeRecord(liveness_path, result.liveness),
      smoke: result.smoke ? probeRecord(smoke_path, result.smoke) : null,
    },
    producedBy: "stage:verify",
  });

  const outputs: Record<string, StageOutputValue> = { liveness_ok: result.liveness.ok };
  if (result.liveness.status !== null) outputs.liveness_status = result.liveness.status;
  if (result.smoke) {
    outputs.smoke_ok = result.smoke.ok;
    if (result.smoke.status !== null) outputs.smoke_status = result.smoke.status;
  }

  if (result.pass) return { success: true, outputs };

  const failed = result.smoke && result.liveness.ok ? result.smoke : result.liveness;
  const probePath = failed === result.liveness ? liveness_path : smoke_path;
  return {
    success: false,
    outputs,
    error: executionError("PROBE_FAILED", `GET ${probePath} failed: ${describeProbe(failed)}`, "verify"),
  };
}
