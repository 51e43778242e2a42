import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import { SCHEMA_DIR } from "../schema/registry.js";
import { ConfigurationError } from "../core/errors.js";
import type { DeployctlConfig } from "../types/config.js";

export type ConfigValidationResult =
  | { valid: true; config: DeployctlConfig; errors: null }
  | { valid: false; errors: string };

let cached: { validate: AjvValidateFn<DeployctlConfig>; errorsText: (errors: unknown) => string } | null = null;

async function configValidator(): Promise<NonNullable<typeof cached>> {
  if (cached) return cached;
  const ajv = await loadAjv();
  const schema: unknown = JSON.parse(fs.readFileSync(path.join(SCHEMA_DIR, "config.schema.json"), "utf8"));
  cached = { validate: ajv.compile<DeployctlConfig>(schema), errorsText: (errors) => ajv.errorsText(errors) };
  return cached;
}

/** Validate a loaded config against schemas/config.schema.json. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const { validate, errorsText } = await configValidator();
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: errorsText(validate.errors) };
}

export async function parseConfig(config: unknown): Promise<DeployctlConfig> {
  const res = await validateConfig(config);
  if (!res.valid) {
    throw new ConfigurationError("CONFIG_INVALID", `Invalid configuration: ${res.errors}`);
  }
  return res.config;
}
