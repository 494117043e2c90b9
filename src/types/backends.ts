import type { CancelledError, ExecutionError, OrchestratorError, ValidationError } from "../errors.js";
import type { Result } from "./result.js";
import type { ParameterSet, UpgradeSource } from "./matrix.js";

/** Where a command should land: the kube context of a cluster and a namespace within it. */
export type ClusterTarget = Readonly<{
  namespace: string;
  kubeContext: string | null;
}>;

export type ClusterHandle = Readonly<{
  name: string;
  versionLabel: string;
  kubeContext: string;
}>;

export type ChartValues = Readonly<{
  files: readonly string[];
  set: ParameterSet;
}>;

export type ReleaseHandle = Readonly<{
  name: string;
  namespace: string;
  revision: number | null;
  chartVersion: string | null;
}>;

/** A third-party chart the scenario needs in the cluster, e.g. a local ACME server. */
export type PrerequisiteChart = Readonly<{
  release: string;
  chart: string;
  repo: string;
  version: string | null;
  namespace: string;
  values: ChartValues;
}>;

/** Set up once per cluster before the chart under test is touched. */
export type Prerequisites = Readonly<{
  helmPlugins: readonly string[];
  charts: readonly PrerequisiteChart[];
}>;

/** Source of a chart to install: the local checkout or a published repository version. */
export type ChartSource =
  | { type: "local" }
  | { type: "repository"; version: string };

export type WorkloadStatus = Readonly<{
  ready: boolean;
  restartCounts: Readonly<Record<string, number>>;
}>;

export type TestSuiteReport = Readonly<{
  passed: boolean;
  total: number;
  failed: number;
  skipped: number;
  durationMs: number;
  failures: ReadonlyArray<{ name: string; message: string }>;
  output: string;
  reportPath: string | null;
}>;

export type NamespaceReport = Readonly<{
  sections: ReadonlyArray<{ title: string; content: string }>;
  errors: readonly string[];
}>;

type Outcome<T> = Promise<Result<T, ExecutionError | CancelledError>>;

export interface ClusterProvisioner {
  provision(versionLabel: string, name: string, signal?: AbortSignal): Outcome<ClusterHandle>;
  teardown(handle: ClusterHandle): Outcome<void>;
}

export interface ChartEngine {
  render(values: ChartValues, target: ClusterTarget, signal?: AbortSignal): Outcome<string>;
  lint(values: ChartValues, strict: boolean, signal?: AbortSignal): Outcome<string>;
  install(
    releaseName: string,
    source: ChartSource,
    values: ChartValues,
    target: ClusterTarget,
    signal?: AbortSignal,
  ): Outcome<ReleaseHandle>;
  upgrade(releaseName: string, values: ChartValues, target: ClusterTarget, signal?: AbortSignal): Outcome<ReleaseHandle>;
  diff(releaseName: string, values: ChartValues, target: ClusterTarget, signal?: AbortSignal): Outcome<string>;
  /** Install a helm plugin from its URL; one already installed counts as success. */
  installPlugin(url: string, signal?: AbortSignal): Outcome<string>;
  /** Install a prerequisite chart and wait until its workloads are ready. */
  installPrerequisite(
    chart: PrerequisiteChart,
    kubeContext: string | null,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Outcome<ReleaseHandle>;
  /** Version declared by the local chart's Chart.yaml. */
  chartVersion(): Promise<Result<string, OrchestratorError>>;
}

export interface ApiValidator {
  validateAgainstCluster(
    manifests: string,
    target: ClusterTarget,
    extraArgs: readonly string[],
    signal?: AbortSignal,
  ): Promise<Result<void, ValidationError | ExecutionError | CancelledError>>;
}

export interface ReadinessOracle {
  status(target: ClusterTarget, workloads: readonly string[], signal?: AbortSignal): Promise<WorkloadStatus>;
}

export interface CertificateOracle {
  acquired(target: ClusterTarget, secretName: string, signal?: AbortSignal): Promise<boolean>;
}

export interface FixtureApplier {
  apply(target: ClusterTarget, files: readonly string[], signal?: AbortSignal): Outcome<string>;
}

export interface ClusterInspector {
  namespaceReport(target: ClusterTarget, importantWorkloads: readonly string[], signal?: AbortSignal): Promise<NamespaceReport>;
}

export interface TestSuiteRunner {
  run(suitePath: string, target: ClusterTarget, reportDir: string, signal?: AbortSignal): Outcome<TestSuiteReport>;
}

export interface ReleaseMetadataSource {
  resolveVersion(channel: UpgradeSource, signal?: AbortSignal): Promise<Result<string, OrchestratorError>>;
}

/** Everything a stage may call out to. */
export type Backends = Readonly<{
  provisioner: ClusterProvisioner | null;
  chart: ChartEngine;
  validator: ApiValidator;
  readiness: ReadinessOracle;
  certificates: CertificateOracle;
  fixtures: FixtureApplier;
  inspector: ClusterInspector;
  tests: TestSuiteRunner;
  metadata: ReleaseMetadataSource;
}>;
