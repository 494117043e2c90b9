import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ChartctlConfig } from "../types/config.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const ENV_PREFIX = "CHARTCTL_";

/** Environment keys that land under `settings` rather than at the top level. */
const SETTINGS_KEYS = new Set([
  "concurrency_limit",
  "overall_deadline_seconds",
  "poll_interval_seconds",
  "readiness_deadline_seconds",
  "max_restarts",
  "stable_window_seconds",
  "certificate_deadline_seconds",
  "diagnostics_budget_seconds",
  "lint",
  "provision",
]);

type Plain = Record<string, unknown>;

function isPlain(value: unknown): value is Plain {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Plain, override: Plain): Plain {
  const result: Plain = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlain(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlain(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Plain {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isPlain(parsed) ? parsed : {};
}

function coerce(value: string): string | number | boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

/** Apply CHARTCTL_ prefixed environment variable overrides. */
function applyEnvOverrides(config: Plain, env: NodeJS.ProcessEnv): Plain {
  const result: Plain = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // CHARTCTL_CONCURRENCY_LIMIT → settings.concurrency_limit
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (SETTINGS_KEYS.has(configKey)) {
      const settings = isPlain(result.settings) ? result.settings : {};
      result.settings = { ...settings, [configKey]: coerce(value) };
    } else {
      result[configKey] = value;
    }
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← CHARTCTL_* variables.
 *
 * The result is unvalidated; run it through `validateConfig` before use.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Plain {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));

  return applyEnvOverrides(merged, env);
}

export type { ChartctlConfig };
