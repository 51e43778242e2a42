import { setTimeout as delay } from "node:timers/promises";
import type { VerifyConfig } from "../../types/config.js";
import type { EnvironmentName } from "../../types/trigger.js";
import type { SecretResolver } from "../../capabilities/secrets.js";
import type { Probe, ProbeResult } from "../../capabilities/probe.js";
import type { Logger } from "../../log/logger.js";
import { ConfigurationError } from "../errors.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export type VerifyStageInput = {
  environment: EnvironmentName;
  config: VerifyConfig;
  secrets: SecretResolver;
  probe: Probe;
  logger: Logger;
  sleep?: Sleep;
  signal?: AbortSignal;
};

export type VerifyStageResult = {
  pass: boolean;
  base_url: string;
  liveness: ProbeResult;
  /** Null when liveness failed and smoke was never issued. */
  smoke: ProbeResult | null;
};

export function joinUrl(base: string, urlPath: string): string {
  return `${base.replace(/\/+$/, "")}${urlPath}`;
}

/**
 * Verify step: wait for the rollout to settle, then liveness, then smoke.
 * One failed probe is final; smoke never runs after a failed liveness probe.
 */
export async function runVerifyStage(input: VerifyStageInput): Promise<VerifyStageResult> {
  const { config, logger, signal } = input;
  const sleep = input.sleep ?? defaultSleep;

  const lookup = await input.secrets.resolveSecret(input.environment, config.base_url_secret);
  if (!lookup.found) {
    throw new ConfigurationError(
      "MISSING_SECRET",
      `Missing secret(s) for environment "${input.environment}": ${config.base_url_secret}`,
    );
  }
  const baseUrl = lookup.value;
  logger.addSecret(baseUrl);

  if (config.stabilization_seconds > 0) {
    logger.info("VERIFY_WAITING", `Waiting ${config.stabilization_seconds}s for the deployment to stabilize`);
    await sleep(config.stabilization_seconds * 1000, signal);
  }

  const liveness = await input.probe.check(joinUrl(baseUrl, config.liveness_path), signal);
  logger.info(liveness.ok ? "PROBE_OK" : "PROBE_FAILED", `GET ${config.liveness_path} → ${liveness.status ?? liveness.error}`);
  if (!liveness.ok) {
    return { pass: false, base_url: baseUrl, liveness, smoke: null };
  }

  const smoke = await input.probe.check(joinUrl(baseUrl, config.smoke_path), signal);
  logger.info(smoke.ok ? "PROBE_OK" : "PROBE_FAILED", `GET ${config.smoke_path} → ${smoke.status ?? smoke.error}`);

  return { pass: smoke.ok, base_url: baseUrl, liveness, smoke };
}
