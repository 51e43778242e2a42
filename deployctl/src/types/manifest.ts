/** Run manifest: checksums of every JSON artifact a run wrote. */
export type ManifestArtifact = {
  path: string;
  schema: string | null;
  sha256: string;
  bytes: number;
  produced_by: string;
  produced_at: string;
  source_format?: string;
};

export type RunManifest = {
  run_id: string;
  created_at: string;
  commit: string;
  environment: string | null;
  schema_registry: Record<string, string>;
  artifacts: ManifestArtifact[];
};
