import { describe, expect, it } from "vitest";
import { ResourceWaiter } from "../src/core/resource-waiter.js";
import { StageExecutor } from "../src/core/stage-executor.js";
import { ValidationError } from "../src/errors.js";
import type { ActionStage, AwaitStage, ConditionStage, PipelineContext } from "../src/types/pipeline.js";
import { err, ok } from "../src/types/result.js";
import { FakeClock, fakeBackends, installEntry, pipelineOptions, type FakeOptions } from "./helpers/fakes.js";

function harness(fake: FakeOptions = {}) {
  const backends = fakeBackends(fake);
  const waiter = new ResourceWaiter(backends.readiness, { pollIntervalMs: 5000, stableWindowMs: 0, clock: new FakeClock() });
  return { backends, executor: new StageExecutor(backends, waiter) };
}

function context(overrides: Partial<PipelineContext> = {}): PipelineContext {
  return {
    entry: installEntry(),
    options: pipelineOptions(),
    releaseName: "example-chart-install-v1-30",
    namespace: "ct-install-v1-30",
    cluster: null,
    manifests: null,
    upgradeFromVersion: null,
    localChartVersion: null,
    ...overrides,
  };
}

function action(invoke: ActionStage["invoke"], overrides: Partial<ActionStage> = {}): ActionStage {
  return { name: "render", kind: "render", policy: "fatal", guard: () => true, mode: "action", invoke, ...overrides };
}

const signal = (): AbortSignal => new AbortController().signal;

describe("StageExecutor", () => {
  it("skips a stage whose guard rejects the context", async () => {
    const { executor, backends } = harness();
    const stage = action(async () => ok({ output: "never" }), { guard: () => false });

    const { result } = await executor.execute(stage, context(), signal());

    expect(result).toEqual({
      name: "render",
      kind: "render",
      policy: "fatal",
      status: "skipped",
      output: "",
      durationMs: 0,
      skipReason: "guard",
    });
    expect(backends.calls).toEqual([]);
  });

  it("threads context updates from a successful action", async () => {
    const { executor } = harness();
    const stage = action(async () => ok({ output: "2 documents", update: { manifests: "kind: Service\n" } }));

    const { result, context: next } = await executor.execute(stage, context(), signal());

    expect(result.status).toBe("ok");
    expect(result.output).toBe("2 documents");
    expect(next.manifests).toBe("kind: Service\n");
  });

  it("turns a thrown error into an execution failure named after the stage", async () => {
    const { executor } = harness();
    const stage = action(async () => {
      throw new Error("boom");
    });

    const { result, context: next } = await executor.execute(stage, context(), signal());

    expect(result.status).toBe("failed");
    expect(result.error).toEqual({ code: "EXECUTION_FAILED", message: "render exited with code 1: boom" });
    expect(result.output).toBe("boom");
    expect(next.manifests).toBeNull();
  });

  it("reports validation details as the stage output", async () => {
    const { executor } = harness();
    const stage = action(async () => err(new ValidationError("manifests rejected", "unknown field spec.foo")), {
      name: "validate-against-api",
      kind: "lint-validate",
    });

    const { result } = await executor.execute(stage, context(), signal());

    expect(result.error?.code).toBe("VALIDATION_FAILED");
    expect(result.output).toBe("unknown field spec.foo");
  });

  it("reports cancellation when the signal aborted during the action", async () => {
    const { executor } = harness();
    const controller = new AbortController();
    const stage = action(async () => {
      controller.abort("interrupted");
      throw new Error("killed");
    });

    const { result } = await executor.execute(stage, context(), controller.signal);

    expect(result.error).toEqual({ code: "CANCELLED", message: "Cancelled: interrupted" });
  });

  it("resolves a policy that depends on the entry", async () => {
    const { executor } = harness({ fail: ["tests"] });
    const stage = action(
      async (ctx, backends, s) => {
        const res = await backends.tests.run("tests", { namespace: ctx.namespace, kubeContext: null }, "/tmp/report", s);
        return res.ok ? ok({ output: res.value.output }) : res;
      },
      {
        name: "run-test-suite",
        kind: "run-tests",
        policy: (ctx) => (ctx.entry.acceptTestFailure ? "tolerant" : "fatal"),
      },
    );

    const { result } = await executor.execute(stage, context({ entry: installEntry({ acceptTestFailure: true }) }), signal());

    expect(result.policy).toBe("tolerant");
    expect(result.status).toBe("failed");
  });

  it("waits for workloads and counts the polls", async () => {
    const { executor } = harness({ readiness: (n) => ({ ready: n >= 2, restartCounts: {} }) });
    const stage: AwaitStage = {
      name: "await-local-ready",
      kind: "await-ready",
      policy: "fatal",
      guard: () => true,
      mode: "await",
      readiness: (ctx) => ({
        name: "hub-ready",
        target: { namespace: ctx.namespace, kubeContext: null },
        workloads: ["deploy/hub", "sts/db"],
        deadlineMs: 60_000,
        maxRestarts: 1,
      }),
    };

    const { result } = await executor.execute(stage, context(), signal());

    expect(result.status).toBe("ok");
    expect(result.attempts).toBe(2);
    expect(result.output).toBe("deploy/hub, sts/db ready after 2 polls");
  });

  it("records the attempts of a readiness timeout", async () => {
    const { executor } = harness({ readiness: () => ({ ready: false, restartCounts: {} }) });
    const stage: AwaitStage = {
      name: "await-local-ready",
      kind: "await-ready",
      policy: "fatal",
      guard: () => true,
      mode: "await",
      readiness: () => ({
        name: "hub-ready",
        target: { namespace: "ct-install-v1-30", kubeContext: null },
        workloads: ["deploy/hub"],
        deadlineMs: 10_000,
        maxRestarts: 1,
      }),
    };

    const { result } = await executor.execute(stage, context(), signal());

    expect(result.attempts).toBe(3);
    expect(result.error).toEqual({ code: "TIMEOUT", message: "hub-ready not ready after 10s (3 polls)" });
    expect(result.output).toBe("hub-ready not ready after 10s (3 polls)");
  });

  it("polls a condition until it holds", async () => {
    const { executor, backends } = harness({ certificate: (n) => n >= 3 });
    const stage: ConditionStage = {
      name: "await-local-cert-acquired",
      kind: "await-cert",
      policy: "fatal",
      guard: () => true,
      mode: "condition",
      condition: (ctx) => ({
        name: "tls-cert",
        deadlineMs: 60_000,
        predicate: (b, s) => b.certificates.acquired({ namespace: ctx.namespace, kubeContext: null }, "hub-tls", s),
      }),
    };

    const { result } = await executor.execute(stage, context(), signal());

    expect(result.output).toBe("tls-cert satisfied after 3 polls");
    expect(backends.calls).toEqual(["certificate", "certificate", "certificate"]);
  });
});
