import path from "node:path";
import { ArtifactWriter } from "../artifact-writer/writer.js";
import { createBackends } from "../backends/index.js";
import { JUNIT_REPORT } from "../backends/test-suite.js";
import { resolvePipelineOptions, resolveSettings } from "../config/validator.js";
import type { Clock } from "../core/clock.js";
import { ShellCommandRunner } from "../core/command-runner.js";
import { DiagnosticsCollector } from "../core/diagnostics.js";
import { selectEntries } from "../core/matrix.js";
import { MatrixRunner, aggregateExitCode } from "../core/matrix-runner.js";
import { ScenarioPipeline } from "../core/pipeline.js";
import { ResourceWaiter } from "../core/resource-waiter.js";
import { generateRunId } from "../core/run-id.js";
import { StageExecutor } from "../core/stage-executor.js";
import { GitOperations, type GitIdentity } from "../git/operations.js";
import { createLogger, type LogFormat, type LogLevel, type LogSink } from "../log/logger.js";
import { buildReport, entryReport, writeReport, type EntryReport, type MatrixReport } from "../report/report.js";
import type { Backends } from "../types/backends.js";
import type { PipelineRun } from "../types/pipeline.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { validateAll, type Diagnostic } from "./validate.js";

export type RunResult =
  | { ok: true; runId: string; runDir: string; reportPath: string; report: MatrixReport; exitCode: ExitCode }
  | { ok: false; errors: Diagnostic[]; exitCode: ExitCode };

export type RunOptions = {
  configDir: string;
  env?: string;
  only?: string[];
  concurrency?: number;
  artifactsDir?: string;
  format?: LogFormat;
  logLevel?: LogLevel;
  /** Aborting cancels every in-flight pipeline, e.g. on SIGINT. */
  signal?: AbortSignal;
  /** Called as each entry reaches its verdict. */
  onEntry?: (entry: EntryReport) => void;
  // seams for tests
  backends?: Backends;
  clock?: Clock;
  git?: GitIdentity;
  logSink?: LogSink;
};

/**
 * Run the matrix: validate config, wire the pipeline, stream completions,
 * then write report.json and the artifact manifest.
 */
export async function run(opts: RunOptions): Promise<RunResult> {
  const validated = await validateAll({ configDir: opts.configDir, env: opts.env });
  if (!validated.ok) return { ...validated, exitCode: EXIT.INVALID_CONFIG };
  const { config } = validated;

  const entries = selectEntries(validated.entries, opts.only ?? []);
  if (entries.length === 0) {
    const message = `no matrix entry matches ${(opts.only ?? []).join(", ")}`;
    return { ok: false, errors: [{ level: "error", code: "NO_ENTRIES", message }], exitCode: EXIT.INVALID_CONFIG };
  }
  if (opts.concurrency !== undefined && (!Number.isInteger(opts.concurrency) || opts.concurrency < 1)) {
    const message = `--concurrency must be a positive integer, got ${opts.concurrency}`;
    return { ok: false, errors: [{ level: "error", code: "INVALID_ARGS", message }], exitCode: EXIT.INVALID_CONFIG };
  }

  const logger = createLogger({ format: opts.format ?? "human", level: opts.logLevel, sink: opts.logSink });
  const settings = resolveSettings(config);
  if (opts.concurrency !== undefined) settings.concurrencyLimit = opts.concurrency;

  const artifactsDir = path.resolve(opts.artifactsDir ?? config.artifacts_dir);
  const identity = opts.git ?? (await new GitOperations(process.cwd()).identity());
  const runId = generateRunId(identity.branch, identity.sha, artifactsDir);
  const writer = new ArtifactWriter(artifactsDir, runId);
  writer.init();

  const runLog = logger.child({ run: runId });
  runLog.info("RUN_START", `run ${runId}: ${entries.length} entries, concurrency ${settings.concurrencyLimit}`);

  const backends = opts.backends ?? createBackends(config, new ShellCommandRunner({ logger }), { provision: settings.provision });
  const waiter = new ResourceWaiter(backends.readiness, {
    pollIntervalMs: settings.pollIntervalMs,
    stableWindowMs: settings.stableWindowMs,
    clock: opts.clock,
    logger,
  });
  const pipeline = new ScenarioPipeline({
    executor: new StageExecutor(backends, waiter, logger),
    collector: new DiagnosticsCollector({ inspector: backends.inspector, budgetMs: settings.diagnosticsBudgetMs, writer, logger }),
    backends,
    options: resolvePipelineOptions(config, settings, writer.getRunDir()),
    logger,
  });
  const matrix = new MatrixRunner(pipeline, {
    concurrencyLimit: settings.concurrencyLimit,
    overallDeadlineMs: settings.overallDeadlineMs,
    logger,
  });

  const runs: PipelineRun[] = [];
  for await (const finished of matrix.completions(entries, opts.signal)) {
    runs.push(finished);
    writer.track(`${finished.entry.id}/${JUNIT_REPORT}`, "test-report", "test-suite");
    opts.onEntry?.(entryReport(finished));
  }

  const exitCode: ExitCode = aggregateExitCode(runs);
  const report = buildReport(runId, runs, exitCode);
  const reportPath = writeReport(writer, report);
  writer.writeManifest(entries.map((e) => e.id));

  runLog.info("RUN_DONE", `run ${runId} finished with exit code ${exitCode}`, { report: reportPath });
  return { ok: true, runId, runDir: writer.getRunDir(), reportPath, report, exitCode };
}

