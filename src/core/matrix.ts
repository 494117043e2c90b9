import { minimatch } from "minimatch";
import { ConfigError } from "../errors.js";
import type { MatrixEntryConfig } from "../types/config.js";
import type { InstallEntry, MatrixEntry, ParameterSet, UpgradeEntry } from "../types/matrix.js";
import { err, ok, type Result } from "../types/result.js";

/** DNS-label-safe slug: lowercase alphanumerics and single dashes. */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function defaultId(def: MatrixEntryConfig): string {
  const parts = [def.scenario, def.cluster_version];
  if (def.upgrade_from) parts.push(def.upgrade_from);
  return slugify(parts.join("-"));
}

function frozen(values: Record<string, string> | undefined): ParameterSet {
  return Object.freeze({ ...(values ?? {}) });
}

/**
 * Turn matrix definitions into immutable entries. Ids come from the
 * definition or are derived from scenario, cluster version and upgrade
 * source; repeats get a numeric suffix so release names never collide.
 */
export function expandMatrix(defs: readonly MatrixEntryConfig[]): Result<MatrixEntry[], ConfigError> {
  const entries: MatrixEntry[] = [];
  const used = new Map<string, number>();

  for (const [index, def] of defs.entries()) {
    const where = `matrix[${index}]`;
    const base = def.id !== undefined ? slugify(def.id) : defaultId(def);
    if (base.length === 0) return err(new ConfigError(`${where}: id is empty after normalization`));

    const seen = used.get(base) ?? 0;
    used.set(base, seen + 1);
    const id = seen === 0 ? base : `${base}-${seen + 1}`;
    if (def.id !== undefined && seen > 0) return err(new ConfigError(`${where}: duplicate id ${def.id}`));

    const common = {
      id,
      clusterVersion: def.cluster_version,
      values: Object.freeze({
        local: frozen(def.local_chart_values),
        validate: frozen(def.validate_values),
        upgradeFrom: frozen(def.upgrade_from_values),
      }),
      createFixtures: def.create_test_fixtures ?? false,
      debugOnFailure: def.debug_on_failure ?? false,
      acceptTestFailure: def.accept_test_failure ?? false,
    };

    if (def.scenario === "upgrade") {
      if (!def.upgrade_from) return err(new ConfigError(`${where}: upgrade entries need upgrade_from (stable or dev)`));
      const entry: UpgradeEntry = { ...common, scenario: "upgrade", upgradeSource: def.upgrade_from };
      entries.push(Object.freeze(entry));
    } else {
      if (def.upgrade_from !== undefined) return err(new ConfigError(`${where}: install entries cannot set upgrade_from`));
      if (def.upgrade_from_values !== undefined) {
        return err(new ConfigError(`${where}: install entries cannot set upgrade_from_values`));
      }
      const entry: InstallEntry = { ...common, scenario: "install" };
      entries.push(Object.freeze(entry));
    }
  }

  return ok(entries);
}

/** Keep entries whose id matches any of the glob patterns; no patterns keeps all. */
export function selectEntries(entries: readonly MatrixEntry[], patterns: readonly string[]): MatrixEntry[] {
  if (patterns.length === 0) return [...entries];
  return entries.filter((entry) => patterns.some((pattern) => minimatch(entry.id, pattern)));
}
