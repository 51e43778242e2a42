/** Run state, persisted as runs/{run_id}/state.json. */
import type { TriggerDescriptor } from "./trigger.js";

export const STAGES = ["test", "build", "deploy", "verify"] as const;

export type StageId = (typeof STAGES)[number];

export type RunStatus =
  | "pending"
  | "testing"
  | "building"
  | "deploying"
  | "verifying"
  | "succeeded"
  | "failed"
  | "skipped";

export type StageStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type ErrorKind = "configuration" | "execution";

export type PipelineError = {
  kind: ErrorKind;
  code: string;
  message: string;
  stage?: StageId;
};

export type ApprovalDecision = "granted" | "denied" | "timeout";

export type StageOutputValue = string | number | boolean;

export type StageRecord = {
  stage: StageId;
  status: StageStatus;
  started_at: string | null;
  finished_at: string | null;
  duration_ms: number | null;
  skip_reason?: string;
  approval?: ApprovalDecision;
  outputs?: Record<string, StageOutputValue>;
  error?: PipelineError;
};

export type PublishedArtifact = {
  registry: string;
  repository: string;
  /** Unique, immutable tag (the commit). */
  tag: string;
  tags: [string, string];
  image: string;
  digest: string;
  /** True when the unique tag already existed and was not pushed again. */
  reused: boolean;
};

export type DeploymentRecord = {
  environment: string;
  image: string;
  activated: boolean;
  detail: string;
};

export type RunState = {
  run_id: string;
  status: RunStatus;
  trigger: TriggerDescriptor;
  created_at: string;
  updated_at: string;
  finished_at: string | null;
  stages: Record<StageId, StageRecord>;
  artifact: PublishedArtifact | null;
  deployment: DeploymentRecord | null;
  failed_stage: StageId | null;
  error: PipelineError | null;
};
