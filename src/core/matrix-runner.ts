import { CancelledError } from "../errors.js";
import type { MatrixEntry } from "../types/matrix.js";
import type { PipelineRun } from "../types/pipeline.js";
import { silentLogger, type Logger } from "../log/logger.js";
import { timerMs } from "./clock.js";
import { runBounded } from "./concurrency.js";
import type { ScenarioPipeline } from "./pipeline.js";

export const MATRIX_EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  CANCELLED: 2,
} as const;

export type MatrixExitCode = (typeof MATRIX_EXIT)[keyof typeof MATRIX_EXIT];

export type MatrixOutcome = {
  runs: Map<string, PipelineRun>;
  exitCode: MatrixExitCode;
};

export type MatrixRunnerOptions = {
  concurrencyLimit: number;
  /** Deadline for the whole matrix; in-flight pipelines are cancelled when it passes. */
  overallDeadlineMs: number;
  logger?: Logger;
};

/** Aggregate status: any failure is non-zero; cancellations alone get their own code. */
export function aggregateExitCode(runs: Iterable<PipelineRun>): MatrixExitCode {
  let cancelled = false;
  for (const run of runs) {
    if (run.verdict === "failed") return MATRIX_EXIT.FAILED;
    if (run.verdict === "cancelled") cancelled = true;
  }
  return cancelled ? MATRIX_EXIT.CANCELLED : MATRIX_EXIT.SUCCESS;
}

/**
 * Runs one pipeline per matrix entry, bounded by the concurrency limit. A
 * pipeline's failure is its own; siblings always run to a verdict.
 */
export class MatrixRunner {
  private readonly pipeline: ScenarioPipeline;
  private readonly concurrencyLimit: number;
  private readonly overallDeadlineMs: number;
  private readonly logger: Logger;

  constructor(pipeline: ScenarioPipeline, opts: MatrixRunnerOptions) {
    this.pipeline = pipeline;
    this.concurrencyLimit = opts.concurrencyLimit;
    this.overallDeadlineMs = opts.overallDeadlineMs;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Pipeline runs in the order they finish. */
  async *completions(entries: readonly MatrixEntry[], signal?: AbortSignal): AsyncGenerator<PipelineRun, void, undefined> {
    assertUniqueIds(entries);

    const controller = new AbortController();
    const timer = setTimeout(() => {
      this.logger.error("DEADLINE", `overall deadline of ${Math.round(this.overallDeadlineMs / 1000)}s exceeded, cancelling`);
      controller.abort(new CancelledError("overall deadline exceeded"));
    }, timerMs(this.overallDeadlineMs));
    const forward = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) forward();
    signal?.addEventListener("abort", forward, { once: true });

    try {
      yield* runBounded(entries, this.concurrencyLimit, (entry) =>
        this.pipeline.run(entry, controller.signal).catch((e: unknown) => this.crashed(entry, e)),
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forward);
    }
  }

  private crashed(entry: MatrixEntry, e: unknown): PipelineRun {
    const message = e instanceof Error ? e.message : String(e);
    this.logger.error("PIPELINE_CRASHED", `${entry.id}: ${message}`, { entry: entry.id });
    const ctx = this.pipeline.initialContext(entry);
    const now = new Date().toISOString();
    return {
      entry,
      releaseName: ctx.releaseName,
      namespace: ctx.namespace,
      startedAt: now,
      finishedAt: now,
      results: [],
      verdict: "failed",
      firstFatalStage: null,
      diagnostics: null,
      teardownError: null,
    };
  }

  async runAll(entries: readonly MatrixEntry[], signal?: AbortSignal): Promise<MatrixOutcome> {
    const runs = new Map<string, PipelineRun>();
    for await (const run of this.completions(entries, signal)) {
      runs.set(run.entry.id, run);
    }
    return { runs, exitCode: aggregateExitCode(runs.values()) };
  }
}

function assertUniqueIds(entries: readonly MatrixEntry[]): void {
  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.id)) throw new RangeError(`duplicate matrix entry id: ${entry.id}`);
    seen.add(entry.id);
  }
}
