import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { run, type RunOptions } from "../src/commands/run.js";
import { listRuns, status } from "../src/commands/status.js";
import { validateRunArtifacts } from "../src/commands/validate.js";
import type { EntryReport } from "../src/report/report.js";
import { FakeClock, fakeBackends, type FakeOptions } from "./helpers/fakes.js";
import { writeConfigDir } from "./helpers/config.js";

describe("run", () => {
  let tmpDir: string;
  let configDir: string;
  let artifactsDir: string;
  let logLines: string[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "chartctl-run-"));
    configDir = writeConfigDir(tmpDir);
    artifactsDir = path.join(tmpDir, "artifacts");
    logLines = [];
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function options(fake: FakeOptions = {}, overrides: Partial<RunOptions> = {}): RunOptions {
    return {
      configDir,
      artifactsDir,
      format: "jsonl",
      backends: fakeBackends(fake),
      clock: new FakeClock(),
      git: { branch: "main", sha: "abc1234def" },
      logSink: { write: (chunk: string) => logLines.push(chunk) },
      ...overrides,
    };
  }

  it("runs every entry, then writes the report and manifest", async () => {
    const streamed: EntryReport[] = [];

    const res = await run(options({}, { onEntry: (entry) => streamed.push(entry) }));

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.exitCode).toBe(0);
    expect(res.runId).toMatch(/^main-abc1234-\d{8}-001$/);
    expect(res.report.summary).toEqual({ total: 5, passed: 5, failed: 0, "failed-tolerated": 0, cancelled: 0 });
    expect(streamed.map((e) => e.id).sort()).toEqual(res.report.entries.map((e) => e.id));
    expect(res.reportPath).toBe(path.join(artifactsDir, res.runId, "report.json"));

    const manifest: unknown = JSON.parse(fs.readFileSync(path.join(res.runDir, "manifest.json"), "utf8"));
    expect(manifest).toMatchObject({
      entries: ["install-v1-26", "install-v1-30", "install-v1-30-2", "upgrade-v1-29-dev", "upgrade-v1-29-stable"],
    });
    expect(validateRunArtifacts(res.runDir)).toEqual([]);
  });

  it("runs the upgrade head only for upgrade entries", async () => {
    const res = await run(options());

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    const stable = res.report.entries.find((e) => e.id === "upgrade-v1-29-stable");
    const install = res.report.entries.find((e) => e.id === "install-v1-30");
    expect(stable?.stages.find((s) => s.name === "install-prior-release")?.status).toBe("ok");
    expect(install?.stages.find((s) => s.name === "install-prior-release")?.status).toBe("skipped");
    expect(stable?.upgrade_from).toBe("stable");
  });

  it("keeps the upgrade diff in the stored report", async () => {
    const res = await run(options({}, { only: ["upgrade-v1-29-stable"] }));
    if (!res.ok) throw new Error(JSON.stringify(res.errors));

    const shown = await status({ artifactsDir, runId: res.runId });

    expect(shown.ok).toBe(true);
    if (!shown.ok) return;
    const diff = shown.report.entries[0]?.stages.find((s) => s.name === "diff-against-local");
    expect(diff?.output).toBe("Old version: 3.3.7\nNew version: 4.0.0 (replaced)\n\nimage: example/hub:3.3.7\n");
  });

  it("exits 1 when any entry fails and leaves a debug marker where asked", async () => {
    const res = await run(options({ fail: ["render"] }));

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.exitCode).toBe(1);
    expect(res.report.entries.every((e) => e.verdict === "failed" && e.first_fatal_stage === "render")).toBe(true);
    const debugged = res.report.entries.filter((e) => e.debug_session !== null).map((e) => e.id);
    expect(debugged).toEqual(["install-v1-30"]);
  });

  it("tolerates test failures only where the entry allows it", async () => {
    const res = await run(options({ tests: { passed: false, failed: 1 } }, { only: ["install-v1-2*"] }));

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.report.entries.map((e) => [e.id, e.verdict])).toEqual([["install-v1-26", "failed-tolerated"]]);
    expect(res.exitCode).toBe(0);
  });

  it("exits 2 when cancelled", async () => {
    const controller = new AbortController();
    controller.abort("interrupted");

    const res = await run(options({}, { signal: controller.signal, only: ["upgrade-*"] }));

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.exitCode).toBe(2);
    expect(res.report.summary.cancelled).toBe(2);
  });

  it("logs one JSON object per line", async () => {
    await run(options({}, { only: ["install-v1-26"] }));

    const codes = logLines.map((line) => {
      const parsed: unknown = JSON.parse(line);
      return parsed !== null && typeof parsed === "object" && "code" in parsed ? parsed.code : null;
    });
    expect(codes[0]).toBe("RUN_START");
    expect(codes[codes.length - 1]).toBe("RUN_DONE");
    expect(codes).toContain("STAGE_OK");
  });

  it("exits 3 on invalid configuration", async () => {
    const res = await run(options({}, { configDir: path.join(tmpDir, "missing") }));

    expect(res.ok).toBe(false);
    expect(res.exitCode).toBe(3);
  });

  it("exits 3 when the selection matches nothing", async () => {
    const res = await run(options({}, { only: ["nightly-*"] }));

    expect(res).toEqual({
      ok: false,
      exitCode: 3,
      errors: [{ level: "error", code: "NO_ENTRIES", message: "no matrix entry matches nightly-*" }],
    });
  });

  it("rejects a non-positive concurrency override", async () => {
    const res = await run(options({}, { concurrency: 0 }));

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors[0]?.code).toBe("INVALID_ARGS");
  });

  it("numbers repeated runs of the same commit", async () => {
    const first = await run(options({}, { only: ["install-v1-26"] }));
    const second = await run(options({}, { only: ["install-v1-26"] }));

    expect(first.ok && first.runId.endsWith("-001")).toBe(true);
    expect(second.ok && second.runId.endsWith("-002")).toBe(true);
  });
});

describe("status", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "chartctl-status-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads back a finished run and lists it", async () => {
    const artifactsDir = path.join(tmpDir, "artifacts");
    const res = await run({
      configDir: writeConfigDir(tmpDir),
      artifactsDir,
      only: ["install-v1-30"],
      backends: fakeBackends(),
      clock: new FakeClock(),
      git: { branch: "main", sha: "abc1234" },
      logSink: { write: () => true },
    });
    if (!res.ok) throw new Error(JSON.stringify(res.errors));

    const shown = await status({ artifactsDir, runId: res.runId });

    expect(shown).toEqual({ ok: true, report: res.report });
    expect(listRuns(artifactsDir)).toEqual([{ id: res.runId, exit_code: 0, created_at: res.report.created_at }]);
  });

  it("reports a missing run", async () => {
    expect(await status({ artifactsDir: tmpDir, runId: "nope" })).toEqual({ ok: false, error: "No report found for run nope" });
  });

  it("lists nothing for a missing directory", () => {
    expect(listRuns(path.join(tmpDir, "missing"))).toEqual([]);
  });
});
