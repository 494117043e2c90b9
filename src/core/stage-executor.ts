import {
  CancelledError,
  ExecutionError,
  ValidationError,
  abortReason,
  toOrchestratorError,
  type OrchestratorError,
} from "../errors.js";
import type { Backends } from "../types/backends.js";
import type {
  ExecutableStage,
  FailurePolicy,
  PipelineContext,
  Stage,
  StageResult,
  StepOutput,
} from "../types/pipeline.js";
import { err, ok, type Result } from "../types/result.js";
import { silentLogger, type Logger } from "../log/logger.js";
import type { ResourceWaiter } from "./resource-waiter.js";

export type StageExecution = {
  result: StageResult;
  context: PipelineContext;
};

type Attempt = {
  res: Result<StepOutput, OrchestratorError>;
  attempts?: number;
};

export function resolvePolicy(stage: Stage, ctx: PipelineContext): FailurePolicy {
  return typeof stage.policy === "function" ? stage.policy(ctx) : stage.policy;
}

export function skippedResult(stage: Stage, ctx: PipelineContext, reason: string): StageResult {
  return {
    name: stage.name,
    kind: stage.kind,
    policy: resolvePolicy(stage, ctx),
    status: "skipped",
    output: "",
    durationMs: 0,
    skipReason: reason,
  };
}

/**
 * Runs one stage under its guard. Action stages call out through the
 * backends, await stages through the waiter. Whether a failure stops the
 * pipeline is the caller's decision; the result carries the policy.
 */
export class StageExecutor {
  private readonly backends: Backends;
  private readonly waiter: ResourceWaiter;
  private readonly logger: Logger;

  constructor(backends: Backends, waiter: ResourceWaiter, logger: Logger = silentLogger) {
    this.backends = backends;
    this.waiter = waiter;
    this.logger = logger;
  }

  async execute(stage: ExecutableStage, ctx: PipelineContext, signal: AbortSignal): Promise<StageExecution> {
    const log = this.logger.child({ entry: ctx.entry.id, stage: stage.name });

    if (!stage.guard(ctx)) {
      log.debug("STAGE_SKIPPED", `${stage.name}: not applicable`);
      return { result: skippedResult(stage, ctx, "guard"), context: ctx };
    }

    const policy = resolvePolicy(stage, ctx);
    const start = Date.now();
    log.info("STAGE_START", `${stage.name} started`);

    let attempt: Attempt;
    try {
      attempt = await this.dispatch(stage, ctx, signal);
    } catch (e: unknown) {
      attempt = { res: err(signal.aborted ? new CancelledError(abortReason(signal)) : toOrchestratorError(e, stage.name)) };
    }

    const durationMs = Date.now() - start;
    const base = { name: stage.name, kind: stage.kind, policy, durationMs, attempts: attempt.attempts };

    if (!attempt.res.ok) {
      const error = attempt.res.error;
      const level = policy === "tolerant" ? "warn" : "error";
      log[level]("STAGE_FAILED", `${stage.name} failed (${policy}): ${error.message}`, { error_code: error.code, duration_ms: durationMs });
      return {
        result: { ...base, status: "failed", output: outputOf(error), error: { code: error.code, message: error.message } },
        context: ctx,
      };
    }

    log.info("STAGE_OK", `${stage.name} ok in ${Math.round(durationMs / 1000)}s`, { duration_ms: durationMs });
    const { output, update } = attempt.res.value;
    return {
      result: { ...base, status: "ok", output },
      context: update ? { ...ctx, ...update } : ctx,
    };
  }

  private async dispatch(stage: ExecutableStage, ctx: PipelineContext, signal: AbortSignal): Promise<Attempt> {
    switch (stage.mode) {
      case "action":
        return { res: await stage.invoke(ctx, this.backends, signal) };
      case "await": {
        const target = stage.readiness(ctx);
        const res = await this.waiter.awaitReady(target, signal);
        if (!res.ok) return { res: err(res.error), attempts: res.error.attempts };
        return {
          res: ok({ output: `${target.workloads.join(", ")} ready after ${res.value.attempts} polls` }),
          attempts: res.value.attempts,
        };
      }
      case "condition": {
        const condition = stage.condition(ctx);
        const res = await this.waiter.awaitCondition(
          condition.name,
          () => condition.predicate(this.backends, signal),
          condition.deadlineMs,
          signal,
        );
        if (!res.ok) return { res: err(res.error), attempts: res.error.attempts };
        return {
          res: ok({ output: `${condition.name} satisfied after ${res.value.attempts} polls` }),
          attempts: res.value.attempts,
        };
      }
    }
  }
}

function outputOf(error: OrchestratorError): string {
  if (error instanceof ExecutionError) return [error.stdout, error.stderr].filter((s) => s.length > 0).join("\n");
  if (error instanceof ValidationError) return error.details;
  return error.message;
}
