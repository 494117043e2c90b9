import type { ClusterInspector } from "../types/backends.js";
import type { DebugMarker, DiagnosticsBundle, PipelineContext, PipelineRun } from "../types/pipeline.js";
import type { ArtifactWriter } from "../artifact-writer/writer.js";
import { silentLogger, type Logger } from "../log/logger.js";
import { timerMs } from "./clock.js";
import { targetOf } from "./stages.js";

export type DiagnosticsOptions = {
  inspector: ClusterInspector;
  /** Budget for one collection, independent of any cancelled run deadline. */
  budgetMs: number;
  writer?: ArtifactWriter | null;
  logger?: Logger;
};

/**
 * Gathers a namespace report for every run, passing or not, and leaves a
 * debug-session marker for failed runs whose entry asked for one. It reads
 * the run's verdict and never changes it.
 */
export class DiagnosticsCollector {
  private readonly inspector: ClusterInspector;
  private readonly budgetMs: number;
  private readonly writer: ArtifactWriter | null;
  private readonly logger: Logger;

  constructor(opts: DiagnosticsOptions) {
    this.inspector = opts.inspector;
    this.budgetMs = opts.budgetMs;
    this.writer = opts.writer ?? null;
    this.logger = opts.logger ?? silentLogger;
  }

  async collect(run: Readonly<PipelineRun>, ctx: PipelineContext): Promise<DiagnosticsBundle> {
    const log = this.logger.child({ entry: run.entry.id });
    const bundle: DiagnosticsBundle = {
      entryId: run.entry.id,
      verdict: run.verdict,
      collectedAt: new Date().toISOString(),
      namespace: run.namespace,
      sections: [],
      debugSession: null,
      errors: [],
      path: null,
    };

    const signal = AbortSignal.timeout(timerMs(this.budgetMs));
    try {
      const report = await this.inspector.namespaceReport(targetOf(ctx), ctx.options.importantWorkloads, signal);
      bundle.sections.push(...report.sections);
      bundle.errors.push(...report.errors);
    } catch (e: unknown) {
      bundle.errors.push(`namespace report: ${e instanceof Error ? e.message : String(e)}`);
    }

    if (run.verdict === "failed" && run.entry.debugOnFailure) {
      try {
        bundle.debugSession = this.writeDebugMarker(run, ctx);
      } catch (e: unknown) {
        bundle.errors.push(`debug marker: ${e instanceof Error ? e.message : String(e)}`);
      }
      log.warn("DEBUG_SESSION", `debug session marker left for ${run.entry.id}`, {
        namespace: run.namespace,
        kube_context: ctx.cluster?.kubeContext ?? null,
      });
    }

    if (this.writer) {
      try {
        bundle.path = this.writer.writeArtifact({
          relativePath: `${run.entry.id}/diagnostics.json`,
          content: bundle,
          kind: "diagnostics",
          producedBy: "diagnostics-collector",
        });
      } catch (e: unknown) {
        bundle.errors.push(`write diagnostics: ${e instanceof Error ? e.message : String(e)}`);
      }
    }

    for (const message of bundle.errors) log.warn("DIAGNOSTICS_ERROR", message);
    return bundle;
  }

  private writeDebugMarker(run: Readonly<PipelineRun>, ctx: PipelineContext): DebugMarker {
    const marker: DebugMarker = {
      path: "",
      kubeContext: ctx.cluster?.kubeContext ?? null,
      namespace: run.namespace,
      releaseName: run.releaseName,
    };
    if (this.writer) {
      marker.path = this.writer.writeArtifact({
        relativePath: `${run.entry.id}/debug-session.json`,
        content: { ...marker, firstFatalStage: run.firstFatalStage, createdAt: new Date().toISOString() },
        kind: "debug-session",
        producedBy: "diagnostics-collector",
      });
    }
    return marker;
  }
}
