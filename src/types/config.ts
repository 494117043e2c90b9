/** Configuration types: layered YAML config, as written on disk. */
import type { ScenarioKind, UpgradeSource } from "./matrix.js";

export type SettingsConfig = {
  concurrency_limit: number;
  overall_deadline_seconds: number;
  poll_interval_seconds: number;
  readiness_deadline_seconds: number;
  max_restarts: number;
  stable_window_seconds?: number;
  certificate_deadline_seconds?: number;
  diagnostics_budget_seconds?: number;
  lint?: boolean;
  provision?: boolean;
  validate_args?: string[];
};

export type ChartConfig = {
  name: string;
  path: string;
  repo: string;
  values_files?: string[];
  local_values_files?: string[];
  lint_values_file?: string;
  metadata_url: string;
};

export type ClusterConfig = {
  images?: Record<string, string>;
  image_template?: string;
};

export type PrerequisiteChartConfig = {
  release: string;
  chart: string;
  repo: string;
  version?: string;
  namespace?: string;
  values_files?: string[];
  set?: Record<string, string>;
};

export type PrerequisitesConfig = {
  helm_plugins?: string[];
  charts?: PrerequisiteChartConfig[];
};

export type TestSuiteConfig = {
  path: string;
  command: string[];
};

export type MatrixEntryConfig = {
  id?: string;
  cluster_version: string;
  scenario: ScenarioKind;
  upgrade_from?: UpgradeSource;
  upgrade_from_values?: Record<string, string>;
  local_chart_values?: Record<string, string>;
  validate_values?: Record<string, string>;
  create_test_fixtures?: boolean;
  debug_on_failure?: boolean;
  accept_test_failure?: boolean;
};

export type ChartctlConfig = {
  schema_version: string;
  artifacts_dir: string;
  chart: ChartConfig;
  cluster?: ClusterConfig;
  settings: SettingsConfig;
  prerequisites?: PrerequisitesConfig;
  workloads: string[];
  important_workloads?: string[];
  certificate_secret?: string;
  fixtures?: string[];
  tests: TestSuiteConfig;
  matrix: MatrixEntryConfig[];
};
