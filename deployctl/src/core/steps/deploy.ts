import path from "node:path";
import type { ServiceConfig } from "../../types/config.js";
import type { DeploymentRecord, PublishedArtifact } from "../../types/run.js";
import type { EnvironmentName } from "../../types/trigger.js";
import type { SecretResolver } from "../../capabilities/secrets.js";
import type { EnvironmentRuntime } from "../../capabilities/runtime.js";
import type { Logger } from "../../log/logger.js";
import { SECRET_KEYS, resolveDeployConfig, writeDotenv, type EnvironmentConfig } from "../env-config.js";

export type DeployStageInput = {
  environment: EnvironmentName;
  artifact: PublishedArtifact;
  service: ServiceConfig;
  secrets: SecretResolver;
  /** Secrets later stages need; checked before anything goes live. */
  requiredLater?: readonly string[];
  runtime: EnvironmentRuntime;
  scratchDir: string;
  logger: Logger;
  signal?: AbortSignal;
};

export type DeployStageResult = {
  deployment: DeploymentRecord;
  config: EnvironmentConfig;
  env_file: string;
};

/**
 * Deploy step: resolve the environment's configuration, write it to the
 * scratch directory and hand image + configuration to the runtime.
 * A missing or malformed secret throws ConfigurationError before the runtime
 * is touched.
 */
export async function runDeployStage(input: DeployStageInput): Promise<DeployStageResult> {
  const { environment, artifact, logger } = input;

  const config = await resolveDeployConfig(environment, input.service, input.secrets, input.requiredLater);
  for (const key of SECRET_KEYS) logger.addSecret(config[key]);

  const envFile = writeDotenv(path.join(input.scratchDir, `${environment}.env`), config);
  logger.info("DEPLOY_CONFIG_WRITTEN", `Configuration for ${environment} materialized (DEBUG=${config.DEBUG})`);

  // Pin to the unique tag: `latest` may already have moved on.
  const result = await input.runtime.activate({
    environment,
    image: artifact.image,
    envFile,
    signal: input.signal,
  });
  logger.info(result.activated ? "DEPLOY_ACTIVATED" : "DEPLOY_DELEGATED", result.detail);

  return {
    deployment: {
      environment,
      image: artifact.image,
      activated: result.activated,
      detail: result.detail,
    },
    config,
    env_file: envFile,
  };
}
