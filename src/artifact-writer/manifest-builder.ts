import type { IdComposition, Manifest, ManifestArtifact } from "../types/manifest.js";

export type ManifestBuildInput = {
  run_id: string;
  id_composition: IdComposition;
  entries: string[];
  artifacts: ManifestArtifact[];
};

/** Build a manifest; artifacts are listed in path order so manifests diff cleanly. */
export function buildManifest(input: ManifestBuildInput): Manifest {
  return {
    run_id: input.run_id,
    created_at: new Date().toISOString(),
    id_composition: input.id_composition,
    entries: [...input.entries].sort(),
    artifacts: [...input.artifacts].sort((a, b) => a.path.localeCompare(b.path)),
  };
}

/** Split a run id of the form `{branch}-{sha7}-{YYYYMMDD}-{seq}` into its parts. */
export function parseRunId(runId: string): IdComposition | null {
  const match = /^(.+)-([0-9a-f]{7})-(\d{8})-(\d{3})$/.exec(runId);
  if (!match) return null;
  return { branch: match[1], base_sha: match[2], date: match[3], run_seq: match[4] };
}
