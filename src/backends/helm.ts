import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, ExecutionError, type CancelledError, type OrchestratorError } from "../errors.js";
import type { CommandRunner } from "../core/command-runner.js";
import type {
  ChartEngine,
  ChartSource,
  ChartValues,
  ClusterTarget,
  PrerequisiteChart,
  ReleaseHandle,
} from "../types/backends.js";
import { err, ok, type Result } from "../types/result.js";

export type HelmChartOptions = {
  /** Chart name, used as the release name when rendering and to address the published chart. */
  chartName: string;
  /** Local checkout of the chart. */
  chartPath: string;
  /** Repository that publishes released versions of the chart. */
  repo: string;
  binary?: string;
};

type Outcome<T> = Promise<Result<T, ExecutionError | CancelledError>>;

export function valueArgs(values: ChartValues): string[] {
  const args: string[] = [];
  for (const file of values.files) args.push("--values", file);
  for (const [key, value] of Object.entries(values.set)) args.push("--set", `${key}=${value}`);
  return args;
}

function targetArgs(target: ClusterTarget): string[] {
  const args = ["--namespace", target.namespace];
  if (target.kubeContext) args.push("--kube-context", target.kubeContext);
  return args;
}

/** Read release name, revision and chart version from `helm install|upgrade --output json`. */
export function parseReleaseJson(stdout: string, fallback: { name: string; namespace: string }): ReleaseHandle {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return { ...fallback, revision: null, chartVersion: null };
  }
  const obj: object = parsed !== null && typeof parsed === "object" ? parsed : {};
  const name = "name" in obj && typeof obj.name === "string" ? obj.name : fallback.name;
  const namespace = "namespace" in obj && typeof obj.namespace === "string" ? obj.namespace : fallback.namespace;
  const revision = "version" in obj && typeof obj.version === "number" ? obj.version : null;

  let chartVersion: string | null = null;
  if ("chart" in obj && obj.chart !== null && typeof obj.chart === "object" && "metadata" in obj.chart) {
    const metadata = obj.chart.metadata;
    if (metadata !== null && typeof metadata === "object" && "version" in metadata && typeof metadata.version === "string") {
      chartVersion = metadata.version;
    }
  }
  return { name, namespace, revision, chartVersion };
}

/** Chart operations through the helm binary (and the helm-diff plugin for `diff`). */
export class HelmChartEngine implements ChartEngine {
  private readonly runner: CommandRunner;
  private readonly opts: HelmChartOptions;
  private readonly binary: string;

  constructor(runner: CommandRunner, opts: HelmChartOptions) {
    this.runner = runner;
    this.opts = opts;
    this.binary = opts.binary ?? "helm";
  }

  private async helm(name: string, args: string[], signal?: AbortSignal): Outcome<string> {
    const res = await this.runner.run({ name, command: this.binary, args }, signal);
    return res.ok ? ok(res.value.stdout) : res;
  }

  render(values: ChartValues, target: ClusterTarget, signal?: AbortSignal): Outcome<string> {
    return this.helm(
      "helm template",
      ["template", this.opts.chartName, this.opts.chartPath, ...targetArgs(target), ...valueArgs(values)],
      signal,
    );
  }

  lint(values: ChartValues, strict: boolean, signal?: AbortSignal): Outcome<string> {
    const args = ["lint", this.opts.chartPath, ...valueArgs(values)];
    if (strict) args.push("--strict");
    return this.helm(strict ? "helm lint --strict" : "helm lint", args, signal);
  }

  async install(
    releaseName: string,
    source: ChartSource,
    values: ChartValues,
    target: ClusterTarget,
    signal?: AbortSignal,
  ): Outcome<ReleaseHandle> {
    const chart =
      source.type === "repository"
        ? [this.opts.chartName, "--repo", this.opts.repo, "--version", source.version]
        : [this.opts.chartPath];
    const res = await this.helm(
      "helm install",
      ["install", releaseName, ...chart, ...targetArgs(target), "--create-namespace", ...valueArgs(values), "--output", "json"],
      signal,
    );
    if (!res.ok) return res;
    return ok(parseReleaseJson(res.value, { name: releaseName, namespace: target.namespace }));
  }

  /** Upgrades the release to the local chart, installing it if absent. */
  async upgrade(releaseName: string, values: ChartValues, target: ClusterTarget, signal?: AbortSignal): Outcome<ReleaseHandle> {
    const res = await this.helm(
      "helm upgrade",
      [
        "upgrade",
        "--install",
        releaseName,
        this.opts.chartPath,
        ...targetArgs(target),
        "--create-namespace",
        ...valueArgs(values),
        "--output",
        "json",
      ],
      signal,
    );
    if (!res.ok) return res;
    return ok(parseReleaseJson(res.value, { name: releaseName, namespace: target.namespace }));
  }

  diff(releaseName: string, values: ChartValues, target: ClusterTarget, signal?: AbortSignal): Outcome<string> {
    return this.helm(
      "helm diff",
      [
        "diff",
        "upgrade",
        "--install",
        releaseName,
        this.opts.chartPath,
        ...targetArgs(target),
        ...valueArgs(values),
        "--show-secrets",
        "--context=3",
      ],
      signal,
    );
  }

  async installPlugin(url: string, signal?: AbortSignal): Outcome<string> {
    const res = await this.helm("helm plugin install", ["plugin", "install", url], signal);
    if (res.ok) return res;
    if (res.error instanceof ExecutionError && /already exists/i.test(res.error.stderr)) return ok(`${url} already installed`);
    return res;
  }

  async installPrerequisite(
    chart: PrerequisiteChart,
    kubeContext: string | null,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Outcome<ReleaseHandle> {
    const args = ["upgrade", "--install", chart.release, chart.chart, "--repo", chart.repo];
    if (chart.version) args.push("--version", chart.version);
    args.push(
      ...targetArgs({ namespace: chart.namespace, kubeContext }),
      "--create-namespace",
      ...valueArgs(chart.values),
      "--wait",
      "--timeout",
      `${Math.ceil(timeoutMs / 1000)}s`,
      "--output",
      "json",
    );
    const res = await this.helm(`helm install ${chart.release}`, args, signal);
    if (!res.ok) return res;
    return ok(parseReleaseJson(res.value, { name: chart.release, namespace: chart.namespace }));
  }

  async chartVersion(): Promise<Result<string, OrchestratorError>> {
    const file = path.join(this.opts.chartPath, "Chart.yaml");
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e: unknown) {
      return err(new ConfigError(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`));
    }
    const doc: unknown = YAML.parse(raw);
    if (doc !== null && typeof doc === "object" && "version" in doc) {
      const version = doc.version;
      if (typeof version === "string" || typeof version === "number") return ok(String(version));
    }
    return err(new ConfigError(`${file} declares no version`));
  }
}
