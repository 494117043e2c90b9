import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "./checksum.js";
import { buildManifest, parseRunId } from "./manifest-builder.js";
import type { ArtifactKind, Manifest, ManifestArtifact } from "../types/manifest.js";

export type WriteArtifactInput = {
  /** Relative path within the run directory (e.g., "install-v1.22/diagnostics.json"). */
  relativePath: string;
  /** JSON content to write. */
  content: unknown;
  kind: ArtifactKind;
  /** Who produced this artifact (e.g., "diagnostics-collector"). */
  producedBy: string;
};

/**
 * Artifact Writer: manages the directory of one matrix run.
 * Writes individual artifacts and generates the final manifest.
 */
export class ArtifactWriter {
  private artifacts: ManifestArtifact[] = [];
  private readonly runDir: string;

  constructor(
    private readonly baseDir: string,
    private readonly runId: string,
  ) {
    this.runDir = path.join(baseDir, runId);
  }

  /** Ensure the run directory exists. */
  init(): void {
    fs.mkdirSync(this.runDir, { recursive: true });
  }

  /** Write a single JSON artifact and track it. */
  writeArtifact(input: WriteArtifactInput): string {
    const fullPath = path.join(this.runDir, input.relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, JSON.stringify(input.content, null, 2) + "\n", "utf8");
    this.track(input.relativePath, input.kind, input.producedBy);
    return fullPath;
  }

  /** Track a file some other process wrote into the run directory (e.g. a JUnit report). */
  track(relativePath: string, kind: ArtifactKind, producedBy: string): boolean {
    const fullPath = path.join(this.runDir, relativePath);
    if (!fs.existsSync(fullPath)) return false;

    this.artifacts = this.artifacts.filter((a) => a.path !== relativePath);
    this.artifacts.push({
      path: relativePath,
      kind,
      sha256: computeSha256(fullPath),
      produced_by: producedBy,
      produced_at: new Date().toISOString(),
    });
    return true;
  }

  /** Generate and write manifest.json. Returns the manifest. */
  writeManifest(entries: string[]): Manifest {
    const manifest = buildManifest({
      run_id: this.runId,
      id_composition: parseRunId(this.runId) ?? { branch: this.runId, base_sha: "", date: "", run_seq: "" },
      entries,
      artifacts: this.artifacts,
    });

    fs.writeFileSync(path.join(this.runDir, "manifest.json"), JSON.stringify(manifest, null, 2) + "\n", "utf8");
    return manifest;
  }

  getRunDir(): string {
    return this.runDir;
  }

  getArtifacts(): ManifestArtifact[] {
    return [...this.artifacts];
  }
}
