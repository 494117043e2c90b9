import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it, vi } from "vitest";
import { DiagnosticsCollector } from "../src/core/diagnostics.js";
import { MatrixRunner, aggregateExitCode } from "../src/core/matrix-runner.js";
import { ScenarioPipeline } from "../src/core/pipeline.js";
import { ResourceWaiter } from "../src/core/resource-waiter.js";
import { StageExecutor } from "../src/core/stage-executor.js";
import type { PipelineRun, Verdict } from "../src/types/pipeline.js";
import { FakeClock, fakeBackends, installEntry, pipelineOptions, untilAborted, upgradeEntry, type FakeOptions } from "./helpers/fakes.js";

function pipelineWith(fake: FakeOptions = {}): ScenarioPipeline {
  const backends = fakeBackends(fake);
  return new ScenarioPipeline({
    executor: new StageExecutor(
      backends,
      new ResourceWaiter(backends.readiness, { pollIntervalMs: 5000, stableWindowMs: 0, clock: new FakeClock() }),
    ),
    collector: new DiagnosticsCollector({ inspector: backends.inspector, budgetMs: 1000 }),
    backends,
    options: pipelineOptions(),
  });
}

const entries = (n: number) => Array.from({ length: n }, (_, i) => installEntry({ id: `install-${i + 1}` }));

const runWith = (verdict: Verdict): PipelineRun => ({
  entry: installEntry(),
  releaseName: "r",
  namespace: "ns",
  startedAt: "",
  finishedAt: "",
  results: [],
  verdict,
  firstFatalStage: null,
  diagnostics: null,
  teardownError: null,
});

describe("MatrixRunner", () => {
  it("never runs more pipelines than the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    const pipeline = pipelineWith({
      hook: async (op) => {
        if (op === "provision") {
          active++;
          peak = Math.max(peak, active);
          await delay(5);
        }
        if (op === "teardown") active--;
      },
    });

    const outcome = await new MatrixRunner(pipeline, { concurrencyLimit: 2, overallDeadlineMs: 10_000 }).runAll(entries(5));

    expect(peak).toBe(2);
    expect(outcome.runs.size).toBe(5);
    expect(outcome.exitCode).toBe(0);
  });

  it("yields runs in completion order", async () => {
    let provisions = 0;
    const pipeline = pipelineWith({
      hook: async (op) => {
        if (op === "provision" && ++provisions === 1) await delay(30);
      },
    });

    const order: string[] = [];
    for await (const run of new MatrixRunner(pipeline, { concurrencyLimit: 2, overallDeadlineMs: 10_000 }).completions(entries(2))) {
      order.push(run.entry.id);
    }

    expect(order).toEqual(["install-2", "install-1"]);
  });

  it("keeps a failing entry from affecting its siblings", async () => {
    let provisions = 0;
    const pipeline = pipelineWith({
      hook: async (op) => {
        if (op === "provision" && ++provisions === 1) throw new Error("k3d crashed");
      },
    });

    const outcome = await new MatrixRunner(pipeline, { concurrencyLimit: 1, overallDeadlineMs: 10_000 }).runAll(entries(3));

    expect(outcome.runs.get("install-1")?.verdict).toBe("failed");
    expect(outcome.runs.get("install-1")?.firstFatalStage).toBe("provision-cluster");
    expect(outcome.runs.get("install-2")?.verdict).toBe("passed");
    expect(outcome.runs.get("install-3")?.verdict).toBe("passed");
    expect(outcome.exitCode).toBe(1);
  });

  it("accepts a deadline longer than a timer can hold", async () => {
    const pipeline = pipelineWith({
      hook: async (op) => {
        if (op === "provision") await delay(20);
      },
    });

    const outcome = await new MatrixRunner(pipeline, { concurrencyLimit: 1, overallDeadlineMs: 30 * 24 * 3600 * 1000 }).runAll(entries(1));

    expect(outcome.runs.get("install-1")?.verdict).toBe("passed");
    expect(outcome.exitCode).toBe(0);
  });

  it("turns a crashed pipeline into a failed run", async () => {
    const pipeline = pipelineWith();
    vi.spyOn(pipeline, "run").mockRejectedValueOnce(new Error("boom"));

    const outcome = await new MatrixRunner(pipeline, { concurrencyLimit: 1, overallDeadlineMs: 10_000 }).runAll(entries(2));

    const crashed = outcome.runs.get("install-1");
    expect(crashed?.verdict).toBe("failed");
    expect(crashed?.results).toEqual([]);
    expect(crashed?.namespace).toBe("ct-install-1");
    expect(outcome.runs.get("install-2")?.verdict).toBe("passed");
  });

  it("cancels in-flight pipelines when the overall deadline passes", async () => {
    const pipeline = pipelineWith({
      hook: async (op, signal) => {
        if (op === "upgrade") await untilAborted(signal);
      },
    });

    const outcome = await new MatrixRunner(pipeline, { concurrencyLimit: 2, overallDeadlineMs: 20 }).runAll([
      installEntry({ id: "a" }),
      upgradeEntry({ id: "b" }),
    ]);

    expect(outcome.runs.get("a")?.verdict).toBe("cancelled");
    expect(outcome.runs.get("b")?.verdict).toBe("cancelled");
    expect(outcome.runs.get("a")?.results.find((s) => s.name === "install-local-chart")?.error?.message).toBe(
      "Cancelled: overall deadline exceeded",
    );
    expect(outcome.exitCode).toBe(2);
  });

  it("forwards an external abort to every pipeline", async () => {
    const controller = new AbortController();
    controller.abort("interrupted");

    const outcome = await new MatrixRunner(pipelineWith(), { concurrencyLimit: 3, overallDeadlineMs: 10_000 }).runAll(
      entries(3),
      controller.signal,
    );

    expect([...outcome.runs.values()].map((r) => r.verdict)).toEqual(["cancelled", "cancelled", "cancelled"]);
    expect(outcome.exitCode).toBe(2);
  });

  it("rejects duplicate entry ids", async () => {
    const runner = new MatrixRunner(pipelineWith(), { concurrencyLimit: 1, overallDeadlineMs: 10_000 });

    await expect(runner.runAll([installEntry({ id: "x" }), installEntry({ id: "x" })])).rejects.toThrow(
      "duplicate matrix entry id: x",
    );
  });
});

describe("aggregateExitCode", () => {
  it("is zero when every run passed or had tolerated failures", () => {
    expect(aggregateExitCode([runWith("passed"), runWith("failed-tolerated")])).toBe(0);
  });

  it("is one when any run failed, even alongside cancellations", () => {
    expect(aggregateExitCode([runWith("cancelled"), runWith("failed")])).toBe(1);
  });

  it("is two when runs were only cancelled", () => {
    expect(aggregateExitCode([runWith("passed"), runWith("cancelled")])).toBe(2);
  });
});
