/** Layered configuration: base.yaml ← {env}.yaml ← DEPLOYCTL_*. */
import type { EnvironmentName } from "./trigger.js";
import type { StageId } from "./run.js";

export type PushTriggerPolicy = {
  branches: string[];
  paths: string[];
};

export type DispatchTriggerPolicy = {
  default_environment: EnvironmentName;
};

export type TriggerPolicy = {
  push: PushTriggerPolicy;
  dispatch: DispatchTriggerPolicy;
};

export type TestConfig = {
  workdir: string;
  install: string[][];
  command: string[];
  /** JUnit XML or JSON report written by the test command, relative to workdir. */
  report?: string;
  /** Overrides for the synthetic test configuration. */
  env?: Record<string, string>;
};

export type ImageConfig = {
  registry: string;
  repository: string;
  context: string;
  dockerfile: string;
  cache_from?: string;
  cache_to?: string;
  username_env?: string;
  token_env?: string;
};

export type ServiceConfig = {
  host: string;
  port: number;
  api_prefix: string;
  ollama_model: string;
};

export type SecretsConfig = {
  /** Prefix of DEPLOYCTL_SECRET_<ENV>_<KEY> style variables. */
  env_prefix: string;
  /** Optional YAML file of { <environment>: { <KEY>: value } }. */
  file?: string;
};

export type DeployConfig = {
  /** argv template; {image}, {env_file} and {environment} are substituted. */
  command?: string[];
};

export type ApprovalConfig = {
  required_environments: EnvironmentName[];
  timeout_seconds: number;
  poll_interval_ms: number;
};

export type VerifyConfig = {
  stabilization_seconds: number;
  liveness_path: string;
  smoke_path: string;
  probe_timeout_ms: number;
  base_url_secret: string;
};

export type ConcurrencyConfig = {
  serialize_environments: EnvironmentName[];
};

export type DeployctlConfig = {
  schema_version: string;
  runs_dir: string;
  trigger: TriggerPolicy;
  test: TestConfig;
  image: ImageConfig;
  service: ServiceConfig;
  secrets: SecretsConfig;
  deploy: DeployConfig;
  approval: ApprovalConfig;
  verify: VerifyConfig;
  concurrency: ConcurrencyConfig;
  timeouts?: Partial<Record<StageId, number>>;
};
