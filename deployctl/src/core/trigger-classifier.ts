import { minimatch } from "minimatch";
import type { TriggerPolicy } from "../types/config.js";
import type { PipelineError } from "../types/run.js";
import {
  ENVIRONMENTS,
  isEnvironmentName,
  type DispatchEvent,
  type PushEvent,
  type TriggerDescriptor,
  type TriggerEvent,
} from "../types/trigger.js";
import { configurationError } from "./errors.js";

export type ClassifyResult =
  | { outcome: "triggered"; trigger: TriggerDescriptor }
  | { outcome: "ignored"; reason: string }
  | { outcome: "invalid"; error: PipelineError };

const IMAGE_TAG = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const FLOATING_TAG = "latest";

/** "refs/heads/main" → "main"; other refs are returned unchanged. */
export function branchFromRef(ref: string): string {
  return ref.startsWith("refs/heads/") ? ref.slice("refs/heads/".length) : ref;
}

/** Files that match at least one of the push path filters. */
export function matchPushPaths(files: string[], patterns: string[]): string[] {
  return files.filter((file) => patterns.some((pattern) => minimatch(file, pattern, { dot: true })));
}

function checkCommit(sha: string): PipelineError | null {
  if (!IMAGE_TAG.test(sha)) {
    return configurationError("INVALID_COMMIT", `Commit identifier is not a valid image tag: "${sha}"`);
  }
  if (sha === FLOATING_TAG) {
    return configurationError("INVALID_COMMIT", `Commit identifier collides with the floating tag "${FLOATING_TAG}"`);
  }
  return null;
}

function classifyPush(event: PushEvent, policy: TriggerPolicy): ClassifyResult {
  const branch = branchFromRef(event.ref);
  if (!policy.push.branches.includes(branch)) {
    return { outcome: "ignored", reason: `Push to "${branch}" is not on a watched branch (${policy.push.branches.join(", ")})` };
  }

  if (event.changed_files && policy.push.paths.length > 0) {
    if (matchPushPaths(event.changed_files, policy.push.paths).length === 0) {
      return { outcome: "ignored", reason: "No changed file matches the push path filters" };
    }
  }

  const commitError = checkCommit(event.sha);
  if (commitError) return { outcome: "invalid", error: commitError };

  return {
    outcome: "triggered",
    trigger: { kind: "push", environment: null, commit: event.sha, ref: event.ref, artifact_tag: event.sha },
  };
}

function classifyDispatch(event: DispatchEvent, policy: TriggerPolicy): ClassifyResult {
  const requested = event.inputs?.environment?.trim() || policy.dispatch.default_environment;
  if (!isEnvironmentName(requested)) {
    return {
      outcome: "invalid",
      error: configurationError(
        "UNKNOWN_ENVIRONMENT",
        `Unknown environment "${requested}"; expected one of ${ENVIRONMENTS.join(", ")}`,
      ),
    };
  }

  const commitError = checkCommit(event.sha);
  if (commitError) return { outcome: "invalid", error: commitError };

  return {
    outcome: "triggered",
    trigger: {
      kind: "manual",
      environment: requested,
      commit: event.sha,
      ref: event.ref ?? null,
      artifact_tag: event.sha,
    },
  };
}

/**
 * Turn the raw triggering event into the descriptor every stage reads.
 * Runs before any stage; configuration problems surface here as `invalid`.
 */
export function classifyTrigger(event: TriggerEvent, policy: TriggerPolicy): ClassifyResult {
  switch (event.event_name) {
    case "push":
      return classifyPush(event, policy);
    case "workflow_dispatch":
      return classifyDispatch(event, policy);
  }
}
