import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "./checksum.js";
import { buildManifest } from "./manifest-builder.js";
import type { ManifestArtifact, RunManifest } from "../types/manifest.js";

export const MANIFEST_FILE = "manifest.json";

export type WriteArtifactInput = {
  /** Relative path within the run directory (e.g. "artifacts/test-report.json"). */
  relativePath: string;
  content: unknown;
  /** Schema name this artifact conforms to, when there is one. */
  schema?: string;
  /** Who produced this artifact (e.g. "stage:test"). */
  producedBy: string;
  /** Original source format if adapted (e.g. "junit_xml"). */
  sourceFormat?: string;
};

/**
 * Writes JSON artifacts into a run directory and records their checksums in
 * manifest.json. Rewriting a path replaces its manifest entry.
 */
export class ArtifactWriter {
  private artifacts = new Map<string, ManifestArtifact>();
  private readonly runDir: string;

  constructor(
    runsDir: string,
    private readonly runId: string,
  ) {
    this.runDir = path.join(runsDir, runId);
  }

  writeArtifact(input: WriteArtifactInput): string {
    const fullPath = path.join(this.runDir, input.relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, JSON.stringify(input.content, null, 2) + "\n", "utf8");

    this.artifacts.set(input.relativePath, {
      path: input.relativePath,
      schema: input.schema ?? null,
      sha256: computeSha256(fullPath),
      bytes: fs.statSync(fullPath).size,
      produced_by: input.producedBy,
      produced_at: new Date().toISOString(),
      ...(input.sourceFormat ? { source_format: input.sourceFormat } : {}),
    });
    return fullPath;
  }

  writeManifest(opts: { commit: string; environment: string | null; schemaVersions: Record<string, string> }): RunManifest {
    const manifest = buildManifest({
      run_id: this.runId,
      commit: opts.commit,
      environment: opts.environment,
      schema_versions: opts.schemaVersions,
      artifacts: [...this.artifacts.values()],
    });

    fs.mkdirSync(this.runDir, { recursive: true });
    fs.writeFileSync(path.join(this.runDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + "\n", "utf8");
    return manifest;
  }

  getRunDir(): string {
    return this.runDir;
  }

  getArtifacts(): ManifestArtifact[] {
    return [...this.artifacts.values()];
  }
}
