import { CancelledError, RestartLimitError, TimeoutError, abortReason } from "../errors.js";
import type { ReadinessOracle, WorkloadStatus } from "../types/backends.js";
import type { ReadinessTarget } from "../types/pipeline.js";
import { err, ok, type Result } from "../types/result.js";
import { silentLogger, type Logger } from "../log/logger.js";
import { systemClock, type Clock } from "./clock.js";

export type AwaitOutcome = { attempts: number; elapsedMs: number };

export type WaiterOptions = {
  pollIntervalMs: number;
  /** How long every workload must stay ready before the gate opens. */
  stableWindowMs: number;
  clock?: Clock;
  logger?: Logger;
};

type PollVerdict<E> = "ready" | "waiting" | E;

/**
 * Readiness gate: polls at a fixed interval until a target is ready, the
 * deadline passes, or a workload exceeds its restart budget.
 */
export class ResourceWaiter {
  private readonly oracle: ReadinessOracle;
  private readonly pollIntervalMs: number;
  private readonly stableWindowMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(oracle: ReadinessOracle, opts: WaiterOptions) {
    this.oracle = oracle;
    this.pollIntervalMs = opts.pollIntervalMs;
    this.stableWindowMs = opts.stableWindowMs;
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Wait until every workload in `target` is ready for the stable window.
   * The restart check runs before readiness on each poll, so a crash-looping
   * workload fails the gate even if it happens to report ready.
   */
  async awaitReady(
    target: ReadinessTarget,
    signal?: AbortSignal,
  ): Promise<Result<AwaitOutcome, TimeoutError | RestartLimitError | CancelledError>> {
    return this.poll<RestartLimitError>(target.name, target.deadlineMs, signal, async (attempts) => {
      const status = await this.oracle.status(target.target, target.workloads, signal);
      const over = firstOverLimit(status, target.maxRestarts);
      if (over) {
        return new RestartLimitError({ workload: over[0], restarts: over[1], maxRestarts: target.maxRestarts, attempts });
      }
      return status.ready ? "ready" : "waiting";
    });
  }

  /** Same loop over a boolean predicate, e.g. a TLS certificate having been issued. */
  async awaitCondition(
    name: string,
    predicate: () => Promise<boolean>,
    deadlineMs: number,
    signal?: AbortSignal,
  ): Promise<Result<AwaitOutcome, TimeoutError | CancelledError>> {
    return this.poll<never>(name, deadlineMs, signal, async () => ((await predicate()) ? "ready" : "waiting"));
  }

  private async poll<E>(
    name: string,
    deadlineMs: number,
    signal: AbortSignal | undefined,
    check: (attempts: number) => Promise<PollVerdict<E>>,
  ): Promise<Result<AwaitOutcome, TimeoutError | CancelledError | E>> {
    const start = this.clock.now();
    let attempts = 0;
    let readySince: number | null = null;

    while (true) {
      if (signal?.aborted) return err(new CancelledError(abortReason(signal), attempts));

      attempts++;
      let verdict: PollVerdict<E>;
      try {
        verdict = await check(attempts);
      } catch (e: unknown) {
        if (signal?.aborted) return err(new CancelledError(abortReason(signal), attempts));
        const message = e instanceof Error ? e.message : String(e);
        this.logger.debug("POLL_ERROR", `${name}: poll ${attempts} failed: ${message}`);
        verdict = "waiting";
      }

      if (verdict !== "ready" && verdict !== "waiting") return err(verdict);

      const now = this.clock.now();
      const elapsedMs = now - start;
      if (verdict === "ready") {
        readySince ??= now;
        if (now - readySince >= this.stableWindowMs) return ok({ attempts, elapsedMs });
      } else {
        readySince = null;
      }

      if (elapsedMs >= deadlineMs) return err(new TimeoutError(name, elapsedMs, attempts));

      this.logger.debug("POLL", `${name}: ${verdict} after ${attempts} polls`);
      try {
        await this.clock.sleep(Math.min(this.pollIntervalMs, deadlineMs - elapsedMs), signal);
      } catch (e: unknown) {
        if (signal?.aborted) return err(new CancelledError(abortReason(signal), attempts));
        throw e;
      }
    }
  }
}

function firstOverLimit(status: WorkloadStatus, maxRestarts: number): [string, number] | null {
  for (const [workload, restarts] of Object.entries(status.restartCounts)) {
    if (restarts > maxRestarts) return [workload, restarts];
  }
  return null;
}
