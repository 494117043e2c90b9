import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "../artifact-writer/checksum.js";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { expandMatrix } from "../core/matrix.js";
import type { ChartctlConfig } from "../types/config.js";
import type { MatrixEntry } from "../types/matrix.js";
import type { ManifestArtifact } from "../types/manifest.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult =
  | { ok: true; config: ChartctlConfig; entries: MatrixEntry[]; warnings: Diagnostic[] }
  | { ok: false; errors: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/**
 * Load the layered config, check it against the schema and expand the
 * matrix. Warnings flag settings that are valid but unlikely to be meant.
 */
export async function validateAll(opts: {
  configDir: string;
  env?: string;
  schemaDir?: string;
  environment?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const configDir = path.resolve(opts.configDir);
  if (!fs.existsSync(path.join(configDir, "base.yaml"))) {
    return { ok: false, errors: [diag("error", "CONFIG_MISSING", `No base.yaml in config directory: ${configDir}`, { path: configDir })] };
  }
  if (opts.env && !fs.existsSync(path.join(configDir, `${opts.env}.yaml`))) {
    return { ok: false, errors: [diag("error", "CONFIG_ENV_MISSING", `No ${opts.env}.yaml in config directory: ${configDir}`)] };
  }

  let raw: Record<string, unknown>;
  try {
    raw = loadConfig(opts.env, configDir, opts.environment);
  } catch (e: unknown) {
    return { ok: false, errors: [diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${e instanceof Error ? e.message : String(e)}`)] };
  }

  const validated = await validateConfig(raw, opts.schemaDir);
  if (!validated.ok) return { ok: false, errors: [diag("error", validated.error.code, validated.error.message)] };
  const config = validated.value;

  const expanded = expandMatrix(config.matrix);
  if (!expanded.ok) return { ok: false, errors: [diag("error", expanded.error.code, expanded.error.message)] };

  const warnings: Diagnostic[] = [];
  if (config.settings.poll_interval_seconds >= config.settings.readiness_deadline_seconds) {
    warnings.push(diag("warn", "POLL_INTERVAL_EXCEEDS_DEADLINE", "poll_interval_seconds is not below readiness_deadline_seconds; each gate polls once"));
  }
  if (expanded.value.some((e) => e.createFixtures) && (config.fixtures ?? []).length === 0) {
    warnings.push(diag("warn", "FIXTURES_MISSING", "matrix entries request test fixtures but none are configured"));
  }

  return { ok: true, config, entries: expanded.value, warnings };
}

/** Check every artifact a run manifest lists against its recorded SHA-256. */
export function validateRunArtifacts(runDir: string): Diagnostic[] {
  const errors: Diagnostic[] = [];
  const manifestPath = path.join(runDir, "manifest.json");
  if (!fs.existsSync(manifestPath)) {
    return [diag("error", "ARTIFACTS_MANIFEST_MISSING", `Missing artifacts manifest: ${manifestPath}`, { path: manifestPath })];
  }

  let manifest: unknown;
  try {
    manifest = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
  } catch (e: unknown) {
    return [diag("error", "ARTIFACTS_MANIFEST_JSON_INVALID", `Invalid JSON manifest: ${e instanceof Error ? e.message : String(e)}`, { path: manifestPath })];
  }

  for (const entry of listedArtifacts(manifest)) {
    const target = path.resolve(runDir, entry.path);
    if (!isWithinDir(path.resolve(runDir), target)) {
      errors.push(diag("error", "ARTIFACTS_PATH_ESCAPES_DIR", `Manifest path escapes run dir: ${entry.path}`, { path: entry.path }));
      continue;
    }
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
      errors.push(diag("error", "ARTIFACTS_FILE_MISSING", `Missing artifact file: ${entry.path}`, { path: target }));
      continue;
    }
    const actualHash = computeSha256(target);
    if (actualHash !== entry.sha256) {
      errors.push(
        diag("error", "ARTIFACTS_SHA256_MISMATCH", `Artifact sha256 mismatch (${entry.path})`, {
          path: target,
          details: { expectedSha256: entry.sha256, actualSha256: actualHash },
        }),
      );
    }
  }

  return errors;
}

function listedArtifacts(manifest: unknown): Array<Pick<ManifestArtifact, "path" | "sha256">> {
  if (manifest === null || typeof manifest !== "object" || !("artifacts" in manifest) || !Array.isArray(manifest.artifacts)) return [];
  const listed: Array<Pick<ManifestArtifact, "path" | "sha256">> = [];
  const items: unknown[] = manifest.artifacts;
  for (const item of items) {
    if (item === null || typeof item !== "object" || !("path" in item) || !("sha256" in item)) continue;
    if (typeof item.path === "string" && typeof item.sha256 === "string") listed.push({ path: item.path, sha256: item.sha256 });
  }
  return listed;
}
