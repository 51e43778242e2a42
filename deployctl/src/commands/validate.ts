import fs from "node:fs";
import path from "node:path";
import { ENVIRONMENTS } from "../types/trigger.js";
import type { RunManifest } from "../types/manifest.js";
import { CONFIG_DIR, loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { computeSha256 } from "../artifact-writer/checksum.js";
import { MANIFEST_FILE } from "../artifact-writer/writer.js";
import { errorMessage } from "../core/errors.js";
import { runDirFor, statePathFor } from "../core/run-store.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

function readJson(filePath: string): { ok: true; data: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, data: JSON.parse(fs.readFileSync(filePath, "utf8")) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

/**
 * Validate the layered configuration of every environment and, with a run id,
 * that run's state, manifest and artifact checksums.
 */
export async function validateAll(opts: {
  configDir?: string;
  runsDir?: string;
  runId?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const configDir = path.resolve(opts.configDir ?? CONFIG_DIR);
  const env = opts.env ?? process.env;

  const basePath = path.join(configDir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    return { ok: false, errors: [diag("error", "CONFIG_BASE_MISSING", `Base configuration not found: ${basePath}`, { path: basePath })] };
  }

  let runsDir: string | undefined = opts.runsDir;
  for (const environment of ENVIRONMENTS) {
    try {
      const res = await validateConfig(loadRawConfig(environment, configDir, env));
      if (!res.valid) {
        errors.push(diag("error", "CONFIG_INVALID", `Config invalid for ${environment}: ${res.errors}`, { path: configDir }));
      } else {
        runsDir ??= res.config.runs_dir;
      }
    } catch (e) {
      errors.push(
        diag("error", "CONFIG_READ_FAILED", `Failed to read config for ${environment}: ${errorMessage(e)}`, { path: configDir })
      );
    }
  }

  if (opts.runId) {
    if (!runsDir) {
      errors.push(diag("error", "RUNS_DIR_UNKNOWN", "Runs directory unknown: pass --runs-dir or fix the configuration"));
    } else {
      const registry = await createRegistry();
      errors.push(...(await validateRun(path.resolve(runsDir), opts.runId, registry)));
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true };
}

async function validateRun(runsDir: string, runId: string, registry: SchemaRegistry): Promise<Diagnostic[]> {
  const errors: Diagnostic[] = [];
  const runDir = runDirFor(runsDir, runId);
  if (!fs.existsSync(runDir)) {
    return [diag("error", "RUN_DIR_MISSING", `Run directory not found: ${runDir}`, { path: runDir })];
  }

  const statePath = statePathFor(runsDir, runId);
  const state = fs.existsSync(statePath) ? readJson(statePath) : null;
  if (!state) {
    errors.push(diag("error", "RUN_STATE_MISSING", `Missing run state: ${statePath}`, { path: statePath }));
  } else if (!state.ok) {
    errors.push(diag("error", "RUN_STATE_JSON_INVALID", `Invalid JSON run state: ${state.error}`, { path: statePath }));
  } else {
    const check = await registry.validate("run-state", state.data);
    if (!check.valid) {
      errors.push(diag("error", "RUN_STATE_INVALID", `Run state invalid: ${check.errors ?? ""}`, { path: statePath }));
    }
  }

  const manifestPath = path.join(runDir, MANIFEST_FILE);
  if (!fs.existsSync(manifestPath)) {
    errors.push(diag("error", "MANIFEST_MISSING", `Missing run manifest: ${manifestPath}`, { path: manifestPath }));
    return errors;
  }
  const read = readJson(manifestPath);
  if (!read.ok) {
    errors.push(diag("error", "MANIFEST_JSON_INVALID", `Invalid JSON manifest: ${read.error}`, { path: manifestPath }));
    return errors;
  }

  const isManifest = await registry.compileAs<RunManifest>("run-manifest");
  if (!isManifest(read.data)) {
    const details = await registry.errorsText(isManifest.errors);
    errors.push(diag("error", "MANIFEST_INVALID", `Run manifest invalid: ${details}`, { path: manifestPath }));
    return errors;
  }

  for (const entry of read.data.artifacts) {
    const target = path.resolve(runDir, entry.path);
    if (!isWithinDir(runDir, target)) {
      errors.push(diag("error", "ARTIFACT_PATH_ESCAPES_DIR", `Manifest path escapes run dir: ${entry.path}`, { path: entry.path }));
      continue;
    }
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
      errors.push(diag("error", "ARTIFACT_FILE_MISSING", `Missing artifact file: ${entry.path}`, { path: target }));
      continue;
    }

    const size = fs.statSync(target).size;
    if (size !== entry.bytes) {
      errors.push(
        diag("error", "ARTIFACT_SIZE_MISMATCH", `Artifact size mismatch (${entry.path}): manifest=${entry.bytes} actual=${size}`, {
          path: target,
          details: { expectedBytes: entry.bytes, actualBytes: size },
        })
      );
    }

    const actualHash = computeSha256(target);
    if (actualHash !== entry.sha256) {
      errors.push(
        diag("error", "ARTIFACT_SHA256_MISMATCH", `Artifact sha256 mismatch (${entry.path}): manifest=${entry.sha256} actual=${actualHash}`, {
          path: target,
          details: { expectedSha256: entry.sha256, actualSha256: actualHash },
        })
      );
    }

    if (entry.schema && registry.get(entry.schema)) {
      const content = readJson(target);
      const check = content.ok ? await registry.validate(entry.schema, content.data) : { valid: false, errors: content.error };
      if (!check.valid) {
        errors.push(
          diag("error", "ARTIFACT_SCHEMA_INVALID", `Artifact ${entry.path} does not match ${entry.schema}: ${check.errors ?? ""}`, {
            path: target,
          })
        );
      }
    }
  }

  return errors;
}
