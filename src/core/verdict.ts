import type { StageResult, Verdict } from "../types/pipeline.js";

/**
 * Terminal verdict of a run. Cancellation wins, then any fatal failure, then
 * tolerated failures. Diagnostics never count.
 */
export function computeVerdict(results: readonly StageResult[], cancelled: boolean): Verdict {
  if (cancelled) return "cancelled";
  const failures = results.filter((r) => r.status === "failed" && r.kind !== "collect-diagnostics");
  if (failures.some((r) => r.policy === "fatal")) return "failed";
  if (failures.length > 0) return "failed-tolerated";
  return "passed";
}

/** First fatal failure, the stage a retry should look at. */
export function firstFatalStage(results: readonly StageResult[]): string | null {
  const found = results.find((r) => r.status === "failed" && r.policy === "fatal" && r.kind !== "collect-diagnostics");
  return found?.name ?? null;
}
