import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { computeSha256, computeSha256FromContent } from "../src/artifact-writer/checksum.js";
import { buildManifest } from "../src/artifact-writer/manifest-builder.js";
import { ArtifactWriter } from "../src/artifact-writer/writer.js";
import { createRegistry } from "../src/schema/registry.js";

const HELLO_WORLD_SHA256 = "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9";

describe("checksum", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "deployctl-checksum-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("hashes a file's bytes", () => {
    const file = path.join(tmpDir, "test.txt");
    fs.writeFileSync(file, "hello world");
    expect(computeSha256(file)).toBe(HELLO_WORLD_SHA256);
  });

  it("hashes string content the same way", () => {
    expect(computeSha256FromContent("hello world")).toBe(HELLO_WORLD_SHA256);
  });
});

describe("manifest-builder", () => {
  it("lists artifacts in path order", () => {
    const entry = (p: string) => ({
      path: p,
      schema: null,
      sha256: "a".repeat(64),
      bytes: 2,
      produced_by: "stage:test",
      produced_at: "2026-01-01T00:00:00.000Z",
    });
    const manifest = buildManifest({
      run_id: "run-1",
      commit: "a1b2c3d",
      environment: null,
      schema_versions: {},
      artifacts: [entry("trigger.json"), entry("artifacts/test-report.json")],
    });
    expect(manifest.artifacts.map((a) => a.path)).toEqual(["artifacts/test-report.json", "trigger.json"]);
  });

  it("generated manifest passes schema validation", async () => {
    const registry = await createRegistry();
    const manifest = buildManifest({
      run_id: "20260101T000000Z-manual-a1b2c3d",
      commit: "a1b2c3d",
      environment: "staging",
      schema_versions: registry.versions(),
      artifacts: [
        {
          path: "artifacts/image.json",
          schema: null,
          sha256: "a".repeat(64),
          bytes: 120,
          produced_by: "stage:build",
          produced_at: new Date().toISOString(),
        },
      ],
    });
    const { valid, errors } = await registry.validate("run-manifest", manifest);
    expect(errors).toBeNull();
    expect(valid).toBe(true);
  });
});

describe("artifact writer", () => {
  let tmpDir: string;
  let writer: ArtifactWriter;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "deployctl-writer-"));
    writer = new ArtifactWriter(tmpDir, "run-1");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes an artifact into the run directory and tracks its checksum", () => {
    const fullPath = writer.writeArtifact({
      relativePath: "artifacts/test-report.json",
      content: { pass: true },
      schema: "test-result",
      producedBy: "stage:test",
      sourceFormat: "junit_xml",
    });

    expect(fullPath).toBe(path.join(tmpDir, "run-1", "artifacts", "test-report.json"));
    expect(fs.readFileSync(fullPath, "utf8")).toBe('{\n  "pass": true\n}\n');
    expect(writer.getArtifacts()).toEqual([
      {
        path: "artifacts/test-report.json",
        schema: "test-result",
        sha256: computeSha256FromContent('{\n  "pass": true\n}\n'),
        bytes: 19,
        produced_by: "stage:test",
        produced_at: expect.any(String),
        source_format: "junit_xml",
      },
    ]);
  });

  it("rewriting a path replaces its entry", () => {
    writer.writeArtifact({ relativePath: "trigger.json", content: { a: 1 }, producedBy: "trigger-classifier" });
    writer.writeArtifact({ relativePath: "trigger.json", content: { a: 22 }, producedBy: "trigger-classifier" });

    expect(writer.getArtifacts()).toHaveLength(1);
    expect(writer.getArtifacts()[0].bytes).toBe(fs.statSync(path.join(writer.getRunDir(), "trigger.json")).size);
  });

  it("writes manifest.json with every tracked artifact", () => {
    writer.writeArtifact({ relativePath: "trigger.json", content: { kind: "push" }, producedBy: "trigger-classifier" });

    const manifest = writer.writeManifest({ commit: "a1b2c3d", environment: null, schemaVersions: { "run-state": "1.0.0" } });

    expect(manifest.run_id).toBe("run-1");
    expect(manifest.artifacts.map((a) => a.path)).toEqual(["trigger.json"]);
    const onDisk = JSON.parse(fs.readFileSync(path.join(tmpDir, "run-1", "manifest.json"), "utf8"));
    expect(onDisk).toEqual(manifest);
  });
});
