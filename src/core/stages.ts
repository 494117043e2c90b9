import { ConfigError, ExecutionError, ValidationError, type OrchestratorError } from "../errors.js";
import { isUpgrade } from "../types/matrix.js";
import type { ChartValues, ClusterTarget } from "../types/backends.js";
import type { PipelineContext, ReadinessTarget, Stage, StepOutput, WaitCondition } from "../types/pipeline.js";
import { err, ok, type Result } from "../types/result.js";

/** Names of the stages that only run when upgrading from a published release. */
export const UPGRADE_STAGES = [
  "install-prior-release",
  "diff-against-local",
  "await-prior-release-ready",
  "await-prior-cert-acquired",
] as const;

const always = (): boolean => true;
const upgrading = (ctx: PipelineContext): boolean => isUpgrade(ctx.entry);
const withCertificate = (ctx: PipelineContext): boolean => ctx.options.certificateSecret !== null;

export function targetOf(ctx: PipelineContext): ClusterTarget {
  return { namespace: ctx.namespace, kubeContext: ctx.cluster?.kubeContext ?? null };
}

/** Values for rendering, linting and API validation. */
export function validationValues(ctx: PipelineContext): ChartValues {
  const files = ctx.options.lintValuesFile ? [ctx.options.lintValuesFile] : ctx.options.valuesFiles;
  return { files, set: ctx.entry.values.validate };
}

export function localValues(ctx: PipelineContext): ChartValues {
  return { files: [...ctx.options.valuesFiles, ...ctx.options.localValuesFiles], set: ctx.entry.values.local };
}

export function priorValues(ctx: PipelineContext): ChartValues {
  return { files: ctx.options.valuesFiles, set: ctx.entry.values.upgradeFrom };
}

/** Cluster name for an entry; k3d caps names at 32 characters. */
export function clusterNameFor(entryId: string): string {
  return `ct-${entryId}`.slice(0, 32).replace(/-+$/, "");
}

/**
 * Helm diff shows the chart version in every label; swapping the local version
 * for the prior one leaves only the changes that matter.
 */
export function normalizeDiff(diff: string, localVersion: string | null, priorVersion: string | null): string {
  if (!localVersion || !priorVersion || localVersion === priorVersion) return diff;
  return diff.split(localVersion).join(priorVersion);
}

function readiness(name: string, ctx: PipelineContext): ReadinessTarget {
  return {
    name,
    target: targetOf(ctx),
    workloads: ctx.options.workloads,
    deadlineMs: ctx.options.readinessDeadlineMs,
    maxRestarts: ctx.options.maxRestarts,
  };
}

function outputOnly(res: Result<string, OrchestratorError>): Result<StepOutput, OrchestratorError> {
  return res.ok ? ok({ output: res.value }) : res;
}

/**
 * The canonical stage list. Install and upgrade share one sequence; the
 * upgrade head is switched on by the `upgrading` guard.
 */
export function buildStages(): Stage[] {
  return [
    {
      name: "provision-cluster",
      kind: "provision",
      mode: "action",
      policy: "fatal",
      guard: (ctx) => ctx.options.provision,
      invoke: async (ctx, backends, signal) => {
        if (!backends.provisioner) return err(new ConfigError("cluster provisioning is enabled but no provisioner is configured"));
        const res = await backends.provisioner.provision(ctx.entry.clusterVersion, clusterNameFor(ctx.entry.id), signal);
        if (!res.ok) return res;
        return ok({ output: `cluster ${res.value.name} (${res.value.versionLabel}) ready`, update: { cluster: res.value } });
      },
    },
    {
      name: "install-prerequisites",
      kind: "prerequisites",
      mode: "action",
      policy: "fatal",
      guard: (ctx) => ctx.options.prerequisites.helmPlugins.length > 0 || ctx.options.prerequisites.charts.length > 0,
      invoke: async (ctx, backends, signal) => {
        const lines: string[] = [];
        for (const url of ctx.options.prerequisites.helmPlugins) {
          const res = await backends.chart.installPlugin(url, signal);
          if (!res.ok) return res;
          lines.push(res.value);
        }
        for (const chart of ctx.options.prerequisites.charts) {
          const kubeContext = ctx.cluster?.kubeContext ?? null;
          const res = await backends.chart.installPrerequisite(chart, kubeContext, ctx.options.readinessDeadlineMs, signal);
          if (!res.ok) return res;
          lines.push(`${chart.chart} ready as ${res.value.name} in ${res.value.namespace}`);
        }
        return ok({ output: lines.join("\n") });
      },
    },
    {
      name: "render",
      kind: "render",
      mode: "action",
      policy: "fatal",
      guard: always,
      invoke: async (ctx, backends, signal) => {
        // validation only checks schemas, so render into a namespace that always exists
        const res = await backends.chart.render(validationValues(ctx), { ...targetOf(ctx), namespace: "default" }, signal);
        if (!res.ok) return res;
        const documents = res.value.split(/^---$/m).filter((doc) => doc.trim().length > 0).length;
        return ok({ output: `rendered ${documents} documents`, update: { manifests: res.value } });
      },
    },
    {
      name: "lint",
      kind: "lint-validate",
      mode: "action",
      policy: "fatal",
      guard: (ctx) => ctx.options.lint,
      invoke: async (ctx, backends, signal) => outputOnly(await backends.chart.lint(validationValues(ctx), false, signal)),
    },
    {
      // strict mode treats every warning as an error; several are known and accepted
      name: "lint-strict",
      kind: "lint-validate",
      mode: "action",
      policy: "tolerant",
      guard: (ctx) => ctx.options.lint,
      invoke: async (ctx, backends, signal) => outputOnly(await backends.chart.lint(validationValues(ctx), true, signal)),
    },
    {
      name: "validate-against-api",
      kind: "lint-validate",
      mode: "action",
      policy: "fatal",
      guard: always,
      invoke: async (ctx, backends, signal) => {
        if (ctx.manifests === null) return err(new ValidationError("no rendered manifests to validate", ""));
        const res = await backends.validator.validateAgainstCluster(
          ctx.manifests,
          { ...targetOf(ctx), namespace: "default" },
          ctx.options.validateArgs,
          signal,
        );
        return res.ok ? ok({ output: "manifests accepted by the API server" }) : res;
      },
    },
    {
      name: "install-prior-release",
      kind: "install-prior-release",
      mode: "action",
      policy: "fatal",
      guard: upgrading,
      invoke: async (ctx, backends, signal) => {
        const entry = ctx.entry;
        if (!isUpgrade(entry)) return err(new ConfigError(`${entry.id} is not an upgrade entry`));
        const version = await backends.metadata.resolveVersion(entry.upgradeSource, signal);
        if (!version.ok) return version;
        const res = await backends.chart.install(
          ctx.releaseName,
          { type: "repository", version: version.value },
          priorValues(ctx),
          targetOf(ctx),
          signal,
        );
        if (!res.ok) return res;
        return ok({
          output: `installed ${entry.upgradeSource} release ${version.value} as ${res.value.name}`,
          update: { upgradeFromVersion: version.value },
        });
      },
    },
    {
      name: "diff-against-local",
      kind: "diff",
      mode: "action",
      policy: "fatal",
      guard: upgrading,
      invoke: async (ctx, backends, signal) => {
        const local = await backends.chart.chartVersion();
        if (!local.ok) return local;
        const res = await backends.chart.diff(ctx.releaseName, localValues(ctx), targetOf(ctx), signal);
        if (!res.ok) return res;
        const header = `Old version: ${ctx.upgradeFromVersion ?? "unknown"}\nNew version: ${local.value} (replaced)\n\n`;
        return ok({
          output: header + normalizeDiff(res.value, local.value, ctx.upgradeFromVersion),
          update: { localChartVersion: local.value },
        });
      },
    },
    {
      name: "await-prior-release-ready",
      kind: "await-ready",
      mode: "await",
      policy: "fatal",
      guard: upgrading,
      readiness: (ctx) => readiness("prior release workloads", ctx),
    },
    {
      name: "await-prior-cert-acquired",
      kind: "await-cert",
      mode: "condition",
      policy: "fatal",
      guard: (ctx) => upgrading(ctx) && withCertificate(ctx),
      condition: (ctx) => certificateCondition("prior release certificate", ctx),
    },
    {
      name: "apply-test-fixtures",
      kind: "apply-fixture",
      mode: "action",
      policy: "fatal",
      guard: (ctx) => ctx.entry.createFixtures,
      invoke: async (ctx, backends, signal) => {
        if (ctx.options.fixtures.length === 0) return err(new ConfigError(`${ctx.entry.id} requests test fixtures but none are configured`));
        return outputOnly(await backends.fixtures.apply(targetOf(ctx), ctx.options.fixtures, signal));
      },
    },
    {
      name: "install-local-chart",
      kind: "install-local",
      mode: "action",
      policy: "fatal",
      guard: always,
      invoke: async (ctx, backends, signal) => {
        const res = await backends.chart.upgrade(ctx.releaseName, localValues(ctx), targetOf(ctx), signal);
        if (!res.ok) return res;
        const revision = res.value.revision === null ? "" : ` (revision ${res.value.revision})`;
        return ok({ output: `installed local chart as ${res.value.name}${revision}` });
      },
    },
    {
      name: "await-local-ready",
      kind: "await-ready",
      mode: "await",
      policy: "fatal",
      guard: always,
      readiness: (ctx) => readiness("local chart workloads", ctx),
    },
    {
      name: "await-local-cert-acquired",
      kind: "await-cert",
      mode: "condition",
      policy: "fatal",
      guard: withCertificate,
      condition: (ctx) => certificateCondition("local chart certificate", ctx),
    },
    {
      name: "run-test-suite",
      kind: "run-tests",
      mode: "action",
      policy: (ctx) => (ctx.entry.acceptTestFailure ? "tolerant" : "fatal"),
      guard: always,
      invoke: async (ctx, backends, signal) => {
        const reportDir = `${ctx.options.artifactsDir}/${ctx.entry.id}`;
        const res = await backends.tests.run(ctx.options.suitePath, targetOf(ctx), reportDir, signal);
        if (!res.ok) return res;
        const report = res.value;
        const summary = `${report.total - report.failed - report.skipped} passed, ${report.failed} failed, ${report.skipped} skipped`;
        if (!report.passed) {
          const names = report.failures.map((f) => f.name).join(", ");
          return err(new ExecutionError({ action: "test suite", exitCode: 1, stderr: names ? `${summary}: ${names}` : summary, stdout: report.output }));
        }
        return ok({ output: summary });
      },
    },
    {
      name: "collect-diagnostics",
      kind: "collect-diagnostics",
      mode: "diagnostics",
      policy: "tolerant",
      guard: always,
    },
  ];
}

function certificateCondition(name: string, ctx: PipelineContext): WaitCondition {
  const secret = ctx.options.certificateSecret ?? "";
  const target = targetOf(ctx);
  return {
    name,
    deadlineMs: ctx.options.certificateDeadlineMs,
    predicate: (backends, signal) => backends.certificates.acquired(target, secret, signal),
  };
}
