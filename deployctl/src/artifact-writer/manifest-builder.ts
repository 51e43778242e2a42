import type { ManifestArtifact, RunManifest } from "../types/manifest.js";

export type ManifestBuildInput = {
  run_id: string;
  commit: string;
  environment: string | null;
  schema_versions: Record<string, string>;
  artifacts: ManifestArtifact[];
};

/** Artifacts are listed in path order so manifests of equal runs compare equal. */
export function buildManifest(input: ManifestBuildInput): RunManifest {
  return {
    run_id: input.run_id,
    created_at: new Date().toISOString(),
    commit: input.commit,
    environment: input.environment,
    schema_registry: input.schema_versions,
    artifacts: [...input.artifacts].sort((a, b) => a.path.localeCompare(b.path)),
  };
}
