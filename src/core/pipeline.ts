import type { MatrixEntry } from "../types/matrix.js";
import type { Backends, ClusterHandle, ClusterProvisioner } from "../types/backends.js";
import type {
  DiagnosticsStage,
  FailurePolicy,
  PipelineContext,
  PipelineOptions,
  PipelineRun,
  Stage,
  StageResult,
} from "../types/pipeline.js";
import { silentLogger, type Logger } from "../log/logger.js";
import type { DiagnosticsCollector } from "./diagnostics.js";
import { resolvePolicy, skippedResult, type StageExecutor } from "./stage-executor.js";
import { buildStages } from "./stages.js";
import { computeVerdict, firstFatalStage } from "./verdict.js";

/** Helm caps release names at 53 characters. */
const MAX_RELEASE_NAME = 53;

export type PlannedStage = {
  name: string;
  kind: Stage["kind"];
  policy: FailurePolicy;
  applies: boolean;
};

export function releaseNameFor(chartName: string, entryId: string): string {
  return `${chartName}-${entryId}`.toLowerCase().slice(0, MAX_RELEASE_NAME).replace(/-+$/, "");
}

export function namespaceFor(entryId: string): string {
  return `ct-${entryId}`.toLowerCase().slice(0, 63).replace(/-+$/, "");
}

export function initialContextFor(entry: MatrixEntry, options: PipelineOptions): PipelineContext {
  return {
    entry,
    options,
    releaseName: releaseNameFor(options.chartName, entry.id),
    namespace: namespaceFor(entry.id),
    cluster: null,
    manifests: null,
    upgradeFromVersion: null,
    localChartVersion: null,
  };
}

/** Stage list for an entry with the guard decision each stage gets up front. */
export function planFor(entry: MatrixEntry, options: PipelineOptions, stages: readonly Stage[] = buildStages()): PlannedStage[] {
  const ctx = initialContextFor(entry, options);
  return stages.map((stage) => ({
    name: stage.name,
    kind: stage.kind,
    policy: resolvePolicy(stage, ctx),
    applies: stage.guard(ctx),
  }));
}

/**
 * One end-to-end test path for a matrix entry. Stages run strictly in
 * order; after a fatal failure or cancellation the rest are recorded as
 * skipped, then diagnostics run regardless.
 */
export class ScenarioPipeline {
  private readonly executor: StageExecutor;
  private readonly collector: DiagnosticsCollector;
  private readonly backends: Backends;
  private readonly options: PipelineOptions;
  private readonly stages: readonly Stage[];
  private readonly logger: Logger;

  constructor(deps: {
    executor: StageExecutor;
    collector: DiagnosticsCollector;
    backends: Backends;
    options: PipelineOptions;
    stages?: Stage[];
    logger?: Logger;
  }) {
    this.executor = deps.executor;
    this.collector = deps.collector;
    this.backends = deps.backends;
    this.options = deps.options;
    this.stages = deps.stages ?? buildStages();
    this.logger = deps.logger ?? silentLogger;
  }

  initialContext(entry: MatrixEntry): PipelineContext {
    return initialContextFor(entry, this.options);
  }

  plan(entry: MatrixEntry): PlannedStage[] {
    return planFor(entry, this.options, this.stages);
  }

  async run(entry: MatrixEntry, signal: AbortSignal): Promise<PipelineRun> {
    const log = this.logger.child({ entry: entry.id });
    let ctx = this.initialContext(entry);
    const run: PipelineRun = {
      entry,
      releaseName: ctx.releaseName,
      namespace: ctx.namespace,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      results: [],
      verdict: "passed",
      firstFatalStage: null,
      diagnostics: null,
      teardownError: null,
    };

    log.info("PIPELINE_START", `${entry.scenario} on ${entry.clusterVersion}`, { release: ctx.releaseName, namespace: ctx.namespace });

    let skipReason: string | null = null;
    let cancelled = false;
    let diagnosticsStage: DiagnosticsStage | null = null;

    for (const stage of this.stages) {
      if (stage.mode === "diagnostics") {
        diagnosticsStage = stage;
        continue;
      }
      if (skipReason === null && signal.aborted) {
        cancelled = true;
        skipReason = "cancelled";
      }
      if (skipReason !== null) {
        run.results.push(skippedResult(stage, ctx, skipReason));
        continue;
      }

      const { result, context } = await this.executor.execute(stage, ctx, signal);
      ctx = context;
      run.results.push(result);

      if (result.status !== "failed") continue;
      if (result.error?.code === "CANCELLED") {
        cancelled = true;
        skipReason = "cancelled";
      } else if (result.policy === "fatal") {
        skipReason = `halted after ${stage.name}`;
      }
    }

    run.verdict = computeVerdict(run.results, cancelled);
    run.firstFatalStage = cancelled ? null : firstFatalStage(run.results);

    if (diagnosticsStage) run.results.push(await this.collectDiagnostics(diagnosticsStage, run, ctx));

    if (ctx.cluster && this.backends.provisioner) {
      run.teardownError = await this.teardown(ctx.cluster, this.backends.provisioner);
      if (run.teardownError !== null) log.warn("TEARDOWN_FAILED", `teardown of ${ctx.cluster.name} failed: ${run.teardownError}`);
    }

    run.finishedAt = new Date().toISOString();
    log.info("PIPELINE_DONE", `${entry.id}: ${run.verdict}`, { verdict: run.verdict, first_fatal_stage: run.firstFatalStage });
    return run;
  }

  /** Best effort: the error message, or null once the cluster is gone. */
  private async teardown(cluster: ClusterHandle, provisioner: ClusterProvisioner): Promise<string | null> {
    try {
      const res = await provisioner.teardown(cluster);
      return res.ok ? null : res.error.message;
    } catch (e: unknown) {
      return e instanceof Error ? e.message : String(e);
    }
  }

  private async collectDiagnostics(stage: DiagnosticsStage, run: PipelineRun, ctx: PipelineContext): Promise<StageResult> {
    const start = Date.now();
    const bundle = await this.collector.collect(run, ctx);
    run.diagnostics = bundle;
    const failed = bundle.errors.length > 0;
    return {
      name: stage.name,
      kind: stage.kind,
      policy: resolvePolicy(stage, ctx),
      status: failed ? "failed" : "ok",
      output: `${bundle.sections.length} report sections${bundle.path ? ` at ${bundle.path}` : ""}`,
      durationMs: Date.now() - start,
      error: failed ? { code: "EXECUTION_FAILED", message: bundle.errors.join("; ") } : undefined,
    };
  }
}
