import fs from "node:fs";
import path from "node:path";
import type { ArtifactWriter } from "../artifact-writer/writer.js";
import type { LogFormat } from "../log/logger.js";
import { compileSchema } from "../schema/ajv.js";
import type { PipelineRun, StageResult, Verdict } from "../types/pipeline.js";
import { err, ok, type Result } from "../types/result.js";

export const REPORT_FILE = "report.json";

export type StageReport = {
  name: string;
  kind: string;
  policy: string;
  status: string;
  /** Stage output as captured: diff text, lint findings, stderr of a failed command. */
  output: string;
  duration_ms: number;
  attempts: number | null;
  error: { code: string; message: string } | null;
  skip_reason: string | null;
};

export type EntryReport = {
  id: string;
  scenario: string;
  cluster_version: string;
  upgrade_from: string | null;
  release: string;
  namespace: string;
  verdict: Verdict;
  first_fatal_stage: string | null;
  diagnostics_path: string | null;
  debug_session: string | null;
  teardown_error: string | null;
  started_at: string;
  finished_at: string | null;
  stages: StageReport[];
};

export type MatrixReport = {
  run_id: string;
  created_at: string;
  exit_code: number;
  summary: Record<Verdict, number> & { total: number };
  entries: EntryReport[];
};

function stageReport(result: StageResult): StageReport {
  return {
    name: result.name,
    kind: result.kind,
    policy: result.policy,
    status: result.status,
    output: result.output,
    duration_ms: result.durationMs,
    attempts: result.attempts ?? null,
    error: result.error ?? null,
    skip_reason: result.skipReason ?? null,
  };
}

export function entryReport(run: PipelineRun): EntryReport {
  return {
    id: run.entry.id,
    scenario: run.entry.scenario,
    cluster_version: run.entry.clusterVersion,
    upgrade_from: run.entry.scenario === "upgrade" ? run.entry.upgradeSource : null,
    release: run.releaseName,
    namespace: run.namespace,
    verdict: run.verdict,
    first_fatal_stage: run.firstFatalStage,
    diagnostics_path: run.diagnostics?.path ?? null,
    debug_session: run.diagnostics?.debugSession?.path || null,
    teardown_error: run.teardownError,
    started_at: run.startedAt,
    finished_at: run.finishedAt,
    stages: run.results.map(stageReport),
  };
}

/** Report over all runs, ordered by entry id. */
export function buildReport(runId: string, runs: Iterable<PipelineRun>, exitCode: number, now: Date = new Date()): MatrixReport {
  const entries = [...runs].map(entryReport).sort((a, b) => a.id.localeCompare(b.id));
  const summary = { total: entries.length, passed: 0, failed: 0, "failed-tolerated": 0, cancelled: 0 };
  for (const entry of entries) summary[entry.verdict]++;
  return { run_id: runId, created_at: now.toISOString(), exit_code: exitCode, summary, entries };
}

/** One line per finished entry, as it completes. */
export function renderEntry(entry: EntryReport, format: LogFormat): string {
  if (format === "jsonl") {
    return JSON.stringify({
      level: entry.verdict === "failed" ? "error" : "info",
      code: "ENTRY_DONE",
      entry: entry.id,
      verdict: entry.verdict,
      first_fatal_stage: entry.first_fatal_stage,
      diagnostics_path: entry.diagnostics_path,
    });
  }
  const where = entry.first_fatal_stage ? ` at ${entry.first_fatal_stage}` : "";
  const tolerated = entry.stages.filter((s) => s.status === "failed" && s.policy === "tolerant").map((s) => s.name);
  const note = entry.verdict === "failed-tolerated" ? ` (tolerated: ${tolerated.join(", ")})` : "";
  return `${entry.verdict.toUpperCase().padEnd(16)} ${entry.id}${where}${note}`;
}

export function renderSummary(report: MatrixReport, format: LogFormat): string {
  const s = report.summary;
  if (format === "jsonl") {
    return JSON.stringify({ level: "info", code: "RUN_DONE", run_id: report.run_id, exit_code: report.exit_code, ...s });
  }
  return (
    `${report.run_id}: ${s.total} entries, ${s.passed} passed, ${s.failed} failed, ` +
    `${s["failed-tolerated"]} failed-tolerated, ${s.cancelled} cancelled`
  );
}

export function writeReport(writer: ArtifactWriter, report: MatrixReport): string {
  return writer.writeArtifact({ relativePath: REPORT_FILE, content: report, kind: "report", producedBy: "matrix-runner" });
}

/** Read a stored report back and check it against `schemas/report.schema.json`. */
export async function readReport(artifactsDir: string, runId: string, schemaDir?: string): Promise<Result<MatrixReport, string>> {
  const reportPath = path.join(artifactsDir, runId, REPORT_FILE);
  if (!fs.existsSync(reportPath)) return err(`No report found for run ${runId}`);

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(reportPath, "utf8"));
  } catch (e: unknown) {
    return err(`Failed to read report: ${e instanceof Error ? e.message : String(e)}`);
  }

  const { ajv, validate } = await compileSchema("report", schemaDir);
  const isReport = (value: unknown): value is MatrixReport => validate(value);
  if (!isReport(parsed)) return err(`Report invalid: ${ajv.errorsText(validate.errors, { dataVar: "report" })}`);
  return ok(parsed);
}
