import { ConfigError } from "../errors.js";
import { timerMs } from "../core/clock.js";
import { compileSchema } from "../schema/ajv.js";
import type { ChartctlConfig } from "../types/config.js";
import type { PipelineOptions } from "../types/pipeline.js";
import { err, ok, type Result } from "../types/result.js";

/** Runtime settings resolved from `settings`, durations in milliseconds. */
export type RuntimeSettings = {
  concurrencyLimit: number;
  overallDeadlineMs: number;
  pollIntervalMs: number;
  readinessDeadlineMs: number;
  maxRestarts: number;
  stableWindowMs: number;
  certificateDeadlineMs: number;
  diagnosticsBudgetMs: number;
  lint: boolean;
  provision: boolean;
};

const DEFAULT_CERTIFICATE_DEADLINE_SECONDS = 120;
const DEFAULT_DIAGNOSTICS_BUDGET_SECONDS = 120;

/** Validate a loaded config against `schemas/config.schema.json`. */
export async function validateConfig(config: unknown, schemaDir?: string): Promise<Result<ChartctlConfig, ConfigError>> {
  const { ajv, validate } = await compileSchema("config", schemaDir);
  const isConfig = (value: unknown): value is ChartctlConfig => validate(value);
  if (!isConfig(config)) return err(new ConfigError(`config invalid: ${ajv.errorsText(validate.errors, { dataVar: "config" })}`));
  return ok(config);
}

export function resolveSettings(config: ChartctlConfig): RuntimeSettings {
  const s = config.settings;
  return {
    concurrencyLimit: s.concurrency_limit,
    overallDeadlineMs: timerMs(s.overall_deadline_seconds * 1000),
    pollIntervalMs: timerMs(s.poll_interval_seconds * 1000),
    readinessDeadlineMs: s.readiness_deadline_seconds * 1000,
    maxRestarts: s.max_restarts,
    stableWindowMs: (s.stable_window_seconds ?? 0) * 1000,
    certificateDeadlineMs: timerMs((s.certificate_deadline_seconds ?? DEFAULT_CERTIFICATE_DEADLINE_SECONDS) * 1000),
    diagnosticsBudgetMs: timerMs((s.diagnostics_budget_seconds ?? DEFAULT_DIAGNOSTICS_BUDGET_SECONDS) * 1000),
    lint: s.lint ?? true,
    provision: s.provision ?? true,
  };
}

/** Pipeline options for one run whose artifacts land in `runDir`. */
export function resolvePipelineOptions(config: ChartctlConfig, settings: RuntimeSettings, runDir: string): PipelineOptions {
  return {
    chartName: config.chart.name,
    valuesFiles: config.chart.values_files ?? [],
    localValuesFiles: config.chart.local_values_files ?? [],
    lintValuesFile: config.chart.lint_values_file ?? null,
    workloads: config.workloads,
    importantWorkloads: config.important_workloads ?? [],
    certificateSecret: config.certificate_secret ?? null,
    fixtures: config.fixtures ?? [],
    suitePath: config.tests.path,
    validateArgs: config.settings.validate_args ?? [],
    lint: settings.lint,
    provision: settings.provision,
    prerequisites: {
      helmPlugins: config.prerequisites?.helm_plugins ?? [],
      charts: (config.prerequisites?.charts ?? []).map((chart) => ({
        release: chart.release,
        chart: chart.chart,
        repo: chart.repo,
        version: chart.version ?? null,
        namespace: chart.namespace ?? "default",
        values: { files: chart.values_files ?? [], set: chart.set ?? {} },
      })),
    },
    readinessDeadlineMs: settings.readinessDeadlineMs,
    certificateDeadlineMs: settings.certificateDeadlineMs,
    maxRestarts: settings.maxRestarts,
    artifactsDir: runDir,
  };
}
