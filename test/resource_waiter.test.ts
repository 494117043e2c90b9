import { describe, expect, it } from "vitest";
import { ResourceWaiter } from "../src/core/resource-waiter.js";
import type { ReadinessOracle, WorkloadStatus } from "../src/types/backends.js";
import type { ReadinessTarget } from "../src/types/pipeline.js";
import { FakeClock } from "./helpers/fakes.js";

function oracle(statusFor: (call: number) => WorkloadStatus): ReadinessOracle & { calls: number } {
  const o = {
    calls: 0,
    status: async (): Promise<WorkloadStatus> => {
      o.calls++;
      return statusFor(o.calls);
    },
  };
  return o;
}

function target(overrides: Partial<ReadinessTarget> = {}): ReadinessTarget {
  return {
    name: "local chart workloads",
    target: { namespace: "ct-install", kubeContext: null },
    workloads: ["deploy/hub"],
    deadlineMs: 150_000,
    maxRestarts: 1,
    ...overrides,
  };
}

describe("ResourceWaiter.awaitReady", () => {
  it("polls at the interval until every workload is ready", async () => {
    const clock = new FakeClock();
    const waiter = new ResourceWaiter(oracle((n) => ({ ready: n >= 3, restartCounts: {} })), {
      pollIntervalMs: 5000,
      stableWindowMs: 0,
      clock,
    });

    const res = await waiter.awaitReady(target());

    expect(res).toEqual({ ok: true, value: { attempts: 3, elapsedMs: 10_000 } });
    expect(clock.sleeps).toEqual([5000, 5000]);
  });

  it("fails with RESTART_LIMIT even when the workload reports ready", async () => {
    const waiter = new ResourceWaiter(oracle(() => ({ ready: true, restartCounts: { "hub-7d9f": 2 } })), {
      pollIntervalMs: 5000,
      stableWindowMs: 0,
      clock: new FakeClock(),
    });

    const res = await waiter.awaitReady(target({ maxRestarts: 1 }));

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("RESTART_LIMIT");
    expect(res.error.message).toBe("hub-7d9f restarted 2 times (max 1)");
    expect(res.error.attempts).toBe(1);
  });

  it("allows restarts up to the limit", async () => {
    const waiter = new ResourceWaiter(oracle(() => ({ ready: true, restartCounts: { "hub-7d9f": 1 } })), {
      pollIntervalMs: 5000,
      stableWindowMs: 0,
      clock: new FakeClock(),
    });

    const res = await waiter.awaitReady(target({ maxRestarts: 1 }));

    expect(res.ok).toBe(true);
  });

  it("times out after the deadline, shortening the last sleep", async () => {
    const clock = new FakeClock();
    const waiter = new ResourceWaiter(oracle(() => ({ ready: false, restartCounts: {} })), {
      pollIntervalMs: 5000,
      stableWindowMs: 0,
      clock,
    });

    const res = await waiter.awaitReady(target({ deadlineMs: 12_000 }));

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("TIMEOUT");
    expect(res.error.message).toBe("local chart workloads not ready after 12s (4 polls)");
    expect(clock.sleeps).toEqual([5000, 5000, 2000]);
  });

  it("requires readiness to hold for the stable window", async () => {
    const pattern = [true, false, true, true, true];
    const waiter = new ResourceWaiter(oracle((n) => ({ ready: pattern[n - 1] ?? true, restartCounts: {} })), {
      pollIntervalMs: 5000,
      stableWindowMs: 5000,
      clock: new FakeClock(),
    });

    const res = await waiter.awaitReady(target());

    expect(res).toEqual({ ok: true, value: { attempts: 4, elapsedMs: 15_000 } });
  });

  it("treats a failing status query as not ready yet", async () => {
    const flaky: ReadinessOracle = {
      status: (() => {
        let calls = 0;
        return async (): Promise<WorkloadStatus> => {
          calls++;
          if (calls === 1) throw new Error("connection refused");
          return { ready: true, restartCounts: {} };
        };
      })(),
    };
    const waiter = new ResourceWaiter(flaky, { pollIntervalMs: 5000, stableWindowMs: 0, clock: new FakeClock() });

    const res = await waiter.awaitReady(target());

    expect(res).toEqual({ ok: true, value: { attempts: 2, elapsedMs: 5000 } });
  });

  it("returns CANCELLED without polling when the signal is already aborted", async () => {
    const o = oracle(() => ({ ready: true, restartCounts: {} }));
    const waiter = new ResourceWaiter(o, { pollIntervalMs: 5000, stableWindowMs: 0, clock: new FakeClock() });
    const controller = new AbortController();
    controller.abort("stop");

    const res = await waiter.awaitReady(target(), controller.signal);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("CANCELLED");
    expect(res.error.message).toBe("Cancelled: stop");
    expect(o.calls).toBe(0);
  });

  it("stops sleeping when cancelled mid-wait", async () => {
    const controller = new AbortController();
    const waiter = new ResourceWaiter(
      oracle((n) => {
        if (n === 2) controller.abort(new Error("overall deadline exceeded"));
        return { ready: false, restartCounts: {} };
      }),
      { pollIntervalMs: 5000, stableWindowMs: 0, clock: new FakeClock() },
    );

    const res = await waiter.awaitReady(target(), controller.signal);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("CANCELLED");
    expect(res.error.message).toBe("Cancelled: overall deadline exceeded");
    expect(res.error.attempts).toBe(2);
  });
});

describe("ResourceWaiter.awaitCondition", () => {
  it("waits for a predicate to turn true", async () => {
    const waiter = new ResourceWaiter(oracle(() => ({ ready: true, restartCounts: {} })), {
      pollIntervalMs: 2000,
      stableWindowMs: 0,
      clock: new FakeClock(),
    });
    let calls = 0;

    const res = await waiter.awaitCondition("certificate", async () => ++calls >= 2, 60_000);

    expect(res).toEqual({ ok: true, value: { attempts: 2, elapsedMs: 2000 } });
  });

  it("times out when the predicate never holds", async () => {
    const waiter = new ResourceWaiter(oracle(() => ({ ready: true, restartCounts: {} })), {
      pollIntervalMs: 2000,
      stableWindowMs: 0,
      clock: new FakeClock(),
    });

    const res = await waiter.awaitCondition("certificate", async () => false, 4000);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe("certificate not ready after 4s (3 polls)");
  });
});
