#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { CancelledError } from "./errors.js";
import { validateAll, validateRunArtifacts, type Diagnostic } from "./commands/validate.js";
import { plan, renderPlan } from "./commands/plan.js";
import { run } from "./commands/run.js";
import { status, listRuns } from "./commands/status.js";
import { EXIT } from "./commands/exit-codes.js";
import { renderEntry, renderSummary } from "./report/report.js";

type Format = "human" | "jsonl";

function parseFormat(value: string): Format {
  if (value !== "human" && value !== "jsonl") throw new InvalidArgumentError("expected human or jsonl");
  return value;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError("expected a positive integer");
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function printDiagnostics(diagnostics: Diagnostic[], format: Format): void {
  for (const d of diagnostics) {
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify(d) + "\n");
    } else {
      console.error(`${d.level === "warn" ? "WARN " : ""}${d.message}`);
    }
  }
}

const program = new Command();

program
  .name("chartctl")
  .description("Run Helm chart install and upgrade tests across a matrix of disposable clusters")
  .version("0.1.0");

program
  .command("validate")
  .description("Validate config and (optionally) a run's artifacts")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay to merge over base.yaml")
  .option("--run-dir <path>", "Verify the artifact checksums of a finished run")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { config: string; env?: string; runDir?: string; format: Format }) => {
    const res = await validateAll({ configDir: opts.config, env: opts.env });
    if (!res.ok) {
      printDiagnostics(res.errors, opts.format);
      process.exit(EXIT.INVALID_CONFIG);
    }
    printDiagnostics(res.warnings, opts.format);

    if (opts.runDir) {
      const errors = validateRunArtifacts(opts.runDir);
      if (errors.length > 0) {
        printDiagnostics(errors, opts.format);
        process.exit(EXIT.FAILED);
      }
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", entries: res.entries.length }) + "\n");
    } else {
      console.log(`OK (${res.entries.length} matrix entries)`);
    }
  });

program
  .command("plan")
  .description("Show the expanded matrix and the stages each entry would run")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay to merge over base.yaml")
  .option("--only <pattern>", "Only entries whose id matches the glob (repeatable)", collect, [])
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { config: string; env?: string; only: string[]; format: Format }) => {
    const res = await plan({ configDir: opts.config, env: opts.env, only: opts.only });
    if (!res.ok) {
      printDiagnostics(res.errors, opts.format);
      process.exit(EXIT.INVALID_CONFIG);
    }
    for (const p of res.plans) process.stdout.write(renderPlan(p, opts.format) + "\n");
  });

program
  .command("run")
  .description("Run the test matrix")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay to merge over base.yaml")
  .option("--only <pattern>", "Only entries whose id matches the glob (repeatable)", collect, [])
  .option("--concurrency <n>", "Override settings.concurrency_limit", parsePositiveInt)
  .option("--artifacts-dir <path>", "Override artifacts_dir")
  .option("--verbose", "Log waiter polls and commands")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: { config: string; env?: string; only: string[]; concurrency?: number; artifactsDir?: string; verbose?: boolean; format: Format }) => {
      const controller = new AbortController();
      const interrupt = (): void => controller.abort(new CancelledError("interrupted"));
      process.once("SIGINT", interrupt);
      process.once("SIGTERM", interrupt);

      try {
        const res = await run({
          configDir: opts.config,
          env: opts.env,
          only: opts.only,
          concurrency: opts.concurrency,
          artifactsDir: opts.artifactsDir,
          format: opts.format,
          logLevel: opts.verbose ? "debug" : "info",
          signal: controller.signal,
          onEntry: (entry) => process.stdout.write(renderEntry(entry, opts.format) + "\n"),
        });

        if (!res.ok) {
          printDiagnostics(res.errors, opts.format);
          process.exitCode = res.exitCode;
          return;
        }
        process.stdout.write(renderSummary(res.report, opts.format) + "\n");
        if (opts.format === "human") console.log(`report: ${res.reportPath}`);
        process.exitCode = res.exitCode;
      } finally {
        process.off("SIGINT", interrupt);
        process.off("SIGTERM", interrupt);
      }
    },
  );

program
  .command("status")
  .description("Show a run's report")
  .argument("[id]", "Run ID (omit to list all)")
  .option("--artifacts-dir <path>", "Artifacts directory", ".chartctl/artifacts")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (id: string | undefined, opts: { artifactsDir: string; format: Format }) => {
    if (!id) {
      const list = listRuns(opts.artifactsDir);
      if (opts.format === "jsonl") {
        for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
      } else {
        if (list.length === 0) { console.log("No runs found."); return; }
        for (const item of list) console.log(`${item.id}  exit ${item.exit_code ?? "?"}  ${item.created_at}`);
      }
      return;
    }

    const res = await status({ artifactsDir: opts.artifactsDir, runId: id });
    if (!res.ok) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "error", code: "STATUS_FAILED", message: res.error }) + "\n");
      } else {
        console.error(res.error);
      }
      process.exit(EXIT.INVALID_CONFIG);
    }
    for (const entry of res.report.entries) process.stdout.write(renderEntry(entry, opts.format) + "\n");
    process.stdout.write(renderSummary(res.report, opts.format) + "\n");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
