import fs from "node:fs";
import path from "node:path";
import { parseJunitXmlFile, type JunitSummary } from "../adapter/junit-xml.js";
import { CancelledError, ExecutionError } from "../errors.js";
import type { CommandRunner } from "../core/command-runner.js";
import type { ClusterTarget, TestSuiteReport, TestSuiteRunner } from "../types/backends.js";
import { err, ok, type Result } from "../types/result.js";

export const JUNIT_REPORT = "junit.xml";

/**
 * Runs the post-install test suite as a command, e.g. `pytest --verbose`,
 * with the suite path and a `--junitxml` report path appended. The suite
 * finds the release through CHARTCTL_NAMESPACE and CHARTCTL_KUBE_CONTEXT.
 */
export class CommandTestSuiteRunner implements TestSuiteRunner {
  private readonly runner: CommandRunner;
  private readonly command: readonly string[];

  constructor(runner: CommandRunner, command: readonly string[]) {
    if (command.length === 0) throw new RangeError("test suite command must not be empty");
    this.runner = runner;
    this.command = command;
  }

  async run(
    suitePath: string,
    target: ClusterTarget,
    reportDir: string,
    signal?: AbortSignal,
  ): Promise<Result<TestSuiteReport, ExecutionError | CancelledError>> {
    const [binary, ...args] = this.command;
    const reportPath = path.join(reportDir, JUNIT_REPORT);
    fs.mkdirSync(reportDir, { recursive: true });

    const env: Record<string, string> = { CHARTCTL_NAMESPACE: target.namespace };
    if (target.kubeContext) env.CHARTCTL_KUBE_CONTEXT = target.kubeContext;

    const res = await this.runner.run(
      { name: "test suite", command: binary, args: [...args, suitePath, `--junitxml=${reportPath}`], env },
      signal,
    );
    if (!res.ok && res.error instanceof CancelledError) return err(res.error);

    // a failing suite still writes its report; without one the run itself broke
    if (!fs.existsSync(reportPath)) {
      if (!res.ok) return res;
      return ok(toReport(null, true, res.value.stdout, res.value.durationMs, null));
    }

    let summary: JunitSummary;
    try {
      summary = parseJunitXmlFile(reportPath);
    } catch (e: unknown) {
      return err(new ExecutionError({ action: "parse test report", exitCode: 1, stderr: e instanceof Error ? e.message : String(e) }));
    }

    if (res.ok) return ok(toReport(summary, true, res.value.stdout, res.value.durationMs, reportPath));
    const stdout = res.error instanceof ExecutionError ? res.error.stdout : "";
    return ok(toReport(summary, false, stdout, summary.duration_ms, reportPath));
  }
}

function toReport(
  summary: JunitSummary | null,
  exitedCleanly: boolean,
  output: string,
  durationMs: number,
  reportPath: string | null,
): TestSuiteReport {
  return {
    passed: exitedCleanly && (summary?.pass ?? true),
    total: summary?.total ?? 0,
    failed: summary?.failed ?? 0,
    skipped: summary?.skipped ?? 0,
    durationMs,
    failures: summary?.failures.map((f) => ({ name: f.name, message: f.message })) ?? [],
    output,
    reportPath,
  };
}
