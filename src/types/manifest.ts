/** Run manifest: integrity anchor for every artifact a matrix run leaves behind. */
export type IdComposition = {
  branch: string;
  base_sha: string;
  date: string;
  run_seq: string;
};

export type ArtifactKind = "report" | "diagnostics" | "debug-session" | "test-report";

export type ManifestArtifact = {
  path: string;
  kind: ArtifactKind;
  sha256: string;
  produced_by: string;
  produced_at: string;
};

export type Manifest = {
  run_id: string;
  created_at: string;
  id_composition: IdComposition;
  entries: string[];
  artifacts: ManifestArtifact[];
};
