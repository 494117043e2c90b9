import { resolvePipelineOptions, resolveSettings } from "../config/validator.js";
import { selectEntries } from "../core/matrix.js";
import { namespaceFor, planFor, releaseNameFor, type PlannedStage } from "../core/pipeline.js";
import type { MatrixEntry } from "../types/matrix.js";
import { validateAll, type Diagnostic } from "./validate.js";

export type EntryPlan = {
  entry: MatrixEntry;
  release: string;
  namespace: string;
  stages: PlannedStage[];
};

export type PlanResult = { ok: true; plans: EntryPlan[] } | { ok: false; errors: Diagnostic[] };

/** Expanded matrix with each entry's stage list and guard decisions, without touching a cluster. */
export async function plan(opts: { configDir: string; env?: string; only?: string[] }): Promise<PlanResult> {
  const validated = await validateAll({ configDir: opts.configDir, env: opts.env });
  if (!validated.ok) return validated;

  const entries = selectEntries(validated.entries, opts.only ?? []);
  if (entries.length === 0) {
    return { ok: false, errors: [{ level: "error", code: "NO_ENTRIES", message: `no matrix entry matches ${(opts.only ?? []).join(", ")}` }] };
  }

  const settings = resolveSettings(validated.config);
  const options = resolvePipelineOptions(validated.config, settings, validated.config.artifacts_dir);
  return {
    ok: true,
    plans: entries.map((entry) => ({
      entry,
      release: releaseNameFor(options.chartName, entry.id),
      namespace: namespaceFor(entry.id),
      stages: planFor(entry, options),
    })),
  };
}

export function renderPlan(p: EntryPlan, format: "human" | "jsonl"): string {
  if (format === "jsonl") {
    return JSON.stringify({
      entry: p.entry.id,
      scenario: p.entry.scenario,
      cluster_version: p.entry.clusterVersion,
      release: p.release,
      namespace: p.namespace,
      stages: p.stages,
    });
  }
  const upgrade = p.entry.scenario === "upgrade" ? ` from ${p.entry.upgradeSource}` : "";
  const lines = [`${p.entry.id}: ${p.entry.scenario}${upgrade} on ${p.entry.clusterVersion} (release ${p.release}, namespace ${p.namespace})`];
  for (const stage of p.stages) {
    const marker = stage.applies ? "run " : "skip";
    lines.push(`  ${marker} ${stage.name.padEnd(26)} ${stage.policy}`);
  }
  return lines.join("\n");
}
