import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { validateAll } from "../src/commands/validate.js";
import { adaptTestResult } from "../src/adapter/adapter.js";
import { computeSha256 } from "../src/artifact-writer/checksum.js";
import { Orchestrator } from "../src/core/orchestrator.js";
import { createMemoryLogger } from "../src/log/logger.js";
import type { RunManifest } from "../src/types/manifest.js";
import { StaticApproval, testConfig, writeConfigDir } from "./helpers/fakes.js";

const FIXTURES = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../fixtures");

describe("deployctl validate: configuration", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "deployctl-validate-"));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("returns ok for the bundled configuration", async () => {
    expect(await validateAll({ env: {} })).toEqual({ ok: true });
  });

  it("fails when base.yaml is missing", async () => {
    const res = await validateAll({ configDir: tmp, env: {} });
    expect(res).toEqual({
      ok: false,
      errors: [
        {
          level: "error",
          code: "CONFIG_BASE_MISSING",
          message: `Base configuration not found: ${path.join(tmp, "base.yaml")}`,
          path: path.join(tmp, "base.yaml"),
        },
      ],
    });
  });

  it("checks every environment's overlay", async () => {
    writeConfigDir(tmp);
    fs.writeFileSync(path.join(tmp, "production.yaml"), "verify:\n  probe_timeout_ms: 0\n");

    const res = await validateAll({ configDir: tmp, env: {} });

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => e.code)).toEqual(["CONFIG_INVALID"]);
      expect(res.errors[0].message).toMatch(/^Config invalid for production: /);
    }
  });
});

describe("deployctl validate: runs", () => {
  let tmp: string;
  let runsDir: string;
  let configDir: string;

  beforeEach(async () => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "deployctl-validate-run-"));
    runsDir = path.join(tmp, "runs");
    configDir = writeConfigDir(path.join(tmp, "config"));

    const orch = new Orchestrator(
      runsDir,
      testConfig(),
      async (_stage, ctx) => {
        ctx.artifacts.writeArtifact({
          relativePath: "artifacts/test-report.json",
          content: adaptTestResult(path.join(FIXTURES, "sample-result.json")),
          schema: "test-result",
          producedBy: "stage:test",
          sourceFormat: "json",
        });
        return { success: true };
      },
      { approval: new StaticApproval("granted"), logger: createMemoryLogger().logger },
    );
    await orch.run({
      runId: "run-1",
      trigger: { kind: "push", environment: null, commit: "a1b2c3d", ref: "refs/heads/main", artifact_tag: "a1b2c3d" },
    });
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("accepts an untouched run", async () => {
    expect(await validateAll({ configDir, runsDir, runId: "run-1", env: {} })).toEqual({ ok: true });
  });

  it("detects a modified artifact", async () => {
    const report = path.join(runsDir, "run-1", "artifacts", "test-report.json");
    fs.appendFileSync(report, " ");

    const res = await validateAll({ configDir, runsDir, runId: "run-1", env: {} });

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => e.code)).toEqual(["ARTIFACT_SIZE_MISMATCH", "ARTIFACT_SHA256_MISMATCH"]);
    }
  });

  it("detects an artifact that no longer matches its schema", async () => {
    const report = path.join(runsDir, "run-1", "artifacts", "test-report.json");
    const manifestPath = path.join(runsDir, "run-1", "manifest.json");
    fs.writeFileSync(report, JSON.stringify({ pass: true }));
    // Re-sign the manifest so only the schema check fails.
    const manifest: RunManifest = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
    for (const entry of manifest.artifacts) {
      if (entry.path === "artifacts/test-report.json") {
        entry.sha256 = computeSha256(report);
        entry.bytes = fs.statSync(report).size;
      }
    }
    fs.writeFileSync(manifestPath, JSON.stringify(manifest));

    const res = await validateAll({ configDir, runsDir, runId: "run-1", env: {} });

    expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["ARTIFACT_SCHEMA_INVALID"]);
  });

  it("reports a missing manifest", async () => {
    fs.rmSync(path.join(runsDir, "run-1", "manifest.json"));
    const res = await validateAll({ configDir, runsDir, runId: "run-1", env: {} });
    expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["MANIFEST_MISSING"]);
  });

  it("reports a manifest entry that escapes the run directory", async () => {
    const manifestPath = path.join(runsDir, "run-1", "manifest.json");
    const manifest: RunManifest = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
    manifest.artifacts[0].path = "../other/state.json";
    fs.writeFileSync(manifestPath, JSON.stringify(manifest));

    const res = await validateAll({ configDir, runsDir, runId: "run-1", env: {} });
    expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["ARTIFACT_PATH_ESCAPES_DIR"]);
  });

  it("reports a run that does not exist", async () => {
    const res = await validateAll({ configDir, runsDir, runId: "run-404", env: {} });
    expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["RUN_DIR_MISSING"]);
  });
});
