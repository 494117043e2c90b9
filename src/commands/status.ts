import fs from "node:fs";
import path from "node:path";
import { REPORT_FILE, readReport, type MatrixReport } from "../report/report.js";

export type StatusResult =
  | { ok: true; report: MatrixReport }
  | { ok: false; error: string };

export type RunListing = { id: string; exit_code: number | null; created_at: string };

/**
 * Read the stored report for a given run ID.
 */
export async function status(opts: { artifactsDir: string; runId: string }): Promise<StatusResult> {
  const res = await readReport(opts.artifactsDir, opts.runId);
  return res.ok ? { ok: true, report: res.value } : { ok: false, error: res.error };
}

/**
 * List all runs that left a report, newest first.
 */
export function listRuns(artifactsDir: string): RunListing[] {
  if (!fs.existsSync(artifactsDir)) return [];

  const results: RunListing[] = [];
  for (const entry of fs.readdirSync(artifactsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const reportPath = path.join(artifactsDir, entry.name, REPORT_FILE);
    if (!fs.existsSync(reportPath)) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(reportPath, "utf8"));
    } catch {
      results.push({ id: entry.name, exit_code: null, created_at: "" });
      continue;
    }
    const obj: object = parsed !== null && typeof parsed === "object" ? parsed : {};
    results.push({
      id: entry.name,
      exit_code: "exit_code" in obj && typeof obj.exit_code === "number" ? obj.exit_code : null,
      created_at: "created_at" in obj && typeof obj.created_at === "string" ? obj.created_at : "",
    });
  }

  return results.sort((a, b) => b.created_at.localeCompare(a.created_at));
}
