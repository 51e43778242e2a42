import fs from "node:fs";
import path from "node:path";
import type { ServiceConfig } from "../types/config.js";
import type { EnvironmentName } from "../types/trigger.js";
import type { SecretResolver } from "../capabilities/secrets.js";
import { ConfigurationError } from "./errors.js";

/** Keys of the service configuration, in the order they are written out. */
export const CONFIG_KEYS = [
  "ENVIRONMENT",
  "OLLAMA_MODEL",
  "OLLAMA_BASE_URL",
  "DEBUG",
  "HOST",
  "PORT",
  "API_PREFIX",
  "DATABASE_URL",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export type EnvironmentConfig = Record<ConfigKey, string>;

/** Keys whose deploy-time values come from the environment's secret set. */
export const SECRET_KEYS = ["DATABASE_URL", "OLLAMA_BASE_URL"] as const satisfies readonly ConfigKey[];

type SecretKey = (typeof SECRET_KEYS)[number];

export const TEST_DEFAULTS: EnvironmentConfig = {
  ENVIRONMENT: "test",
  OLLAMA_MODEL: "llama2",
  OLLAMA_BASE_URL: "http://localhost:11434",
  DEBUG: "true",
  HOST: "0.0.0.0",
  PORT: "8000",
  API_PREFIX: "/api/v1",
  DATABASE_URL: "sqlite:///./test.db",
};

function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Synthetic configuration for the test stage. Deterministic: no secrets are
 * consulted. Overrides for unknown keys are ignored.
 */
export function materializeTestConfig(overrides: Record<string, string> = {}): EnvironmentConfig {
  const config: EnvironmentConfig = { ...TEST_DEFAULTS };
  for (const [key, value] of Object.entries(overrides)) {
    if (isConfigKey(key)) config[key] = value;
  }
  return config;
}

/**
 * Deploy-time configuration for `environment`: fixed service settings merged
 * with the environment's secrets. Every missing secret is reported at once,
 * including the `alsoRequired` keys later stages will read. A value with a
 * line break would add lines to the dotenv file and is rejected.
 */
export async function resolveDeployConfig(
  environment: EnvironmentName,
  service: ServiceConfig,
  secrets: SecretResolver,
  alsoRequired: readonly string[] = [],
): Promise<EnvironmentConfig> {
  const resolved = new Map<string, string>();
  const missing: string[] = [];

  for (const key of [...SECRET_KEYS, ...alsoRequired]) {
    if (resolved.has(key) || missing.includes(key)) continue;
    const res = await secrets.resolveSecret(environment, key);
    if (res.found) resolved.set(key, res.value);
    else missing.push(key);
  }

  if (missing.length > 0) {
    throw new ConfigurationError(
      "MISSING_SECRET",
      `Missing secret(s) for environment "${environment}": ${missing.join(", ")}`,
    );
  }

  const secret = (key: SecretKey): string => {
    const value = resolved.get(key) ?? "";
    if (/[\r\n]/.test(value)) {
      throw new ConfigurationError("INVALID_SECRET", `Secret ${key} for environment "${environment}" contains a line break`);
    }
    return value;
  };
  const databaseUrl = secret("DATABASE_URL");
  const ollamaBaseUrl = secret("OLLAMA_BASE_URL");

  return {
    ENVIRONMENT: environment,
    OLLAMA_MODEL: service.ollama_model,
    OLLAMA_BASE_URL: ollamaBaseUrl,
    DEBUG: String(environment === "development"),
    HOST: service.host,
    PORT: String(service.port),
    API_PREFIX: service.api_prefix,
    DATABASE_URL: databaseUrl,
  };
}

export function renderDotenv(config: EnvironmentConfig): string {
  return CONFIG_KEYS.map((key) => `${key}=${config[key]}`).join("\n") + "\n";
}

/** Write the dotenv file readable by the owner only. */
export function writeDotenv(filePath: string, config: EnvironmentConfig): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, renderDotenv(config), { encoding: "utf8", mode: 0o600 });
  return filePath;
}
