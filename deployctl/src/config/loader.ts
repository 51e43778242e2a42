import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { DeployctlConfig } from "../types/config.js";
import { parseConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "DEPLOYCTL_";
/** Reserved for the environment-variable secret resolver. */
const SECRET_PREFIX = "DEPLOYCTL_SECRET_";

export type RawConfig = Record<string, unknown>;

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  return isPlainObject(parsed) ? parsed : {};
}

function coerce(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+$/.test(value)) return Number(value);
  if (value.startsWith("[") || value.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      return value;
    }
  }
  return value;
}

/**
 * Apply DEPLOYCTL_ prefixed environment variable overrides.
 * DEPLOYCTL_RUNS_DIR → runs_dir, DEPLOYCTL_VERIFY__STABILIZATION_SECONDS → verify.stabilization_seconds
 */
function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || key.startsWith(SECRET_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    let override: RawConfig = {};
    override[segments[segments.length - 1]] = coerce(value);
    for (let i = segments.length - 2; i >= 0; i--) {
      override = { [segments[i]]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

/**
 * Load layered config without validating it: base.yaml ← {envName}.yaml ← environment variables.
 *
 * @param envName - Optional environment name (e.g. "production"); loads `{configDir}/{envName}.yaml` as an override layer.
 */
export function loadRawConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const dir = configDir ?? CONFIG_DIR;

  const base = loadYaml(path.join(dir, "base.yaml"));

  let merged = base;
  if (envName) {
    merged = deepMerge(base, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}

/** Load layered config and validate it; throws ConfigurationError when invalid. */
export async function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<DeployctlConfig> {
  return parseConfig(loadRawConfig(envName, configDir, env));
}
