/**
 * Error taxonomy for pipeline execution. Every error carries a stable `code`
 * that ends up in StageResult.error and in the JSON report.
 */
export type ErrorCode =
  | "EXECUTION_FAILED"
  | "VALIDATION_FAILED"
  | "TIMEOUT"
  | "RESTART_LIMIT"
  | "CANCELLED"
  | "CONFIG_INVALID";

export class OrchestratorError extends Error {
  override readonly name: string = "OrchestratorError";
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

/** An external command exited non-zero (or could not be started). */
export class ExecutionError extends OrchestratorError {
  override readonly name = "ExecutionError";
  readonly action: string;
  readonly exitCode: number;
  readonly stderr: string;
  readonly stdout: string;

  constructor(opts: { action: string; exitCode: number; stderr: string; stdout?: string }) {
    const detail = opts.stderr.trim().split("\n").slice(-1)[0] ?? "";
    super("EXECUTION_FAILED", `${opts.action} exited with code ${opts.exitCode}${detail ? `: ${detail}` : ""}`);
    this.action = opts.action;
    this.exitCode = opts.exitCode;
    this.stderr = opts.stderr;
    this.stdout = opts.stdout ?? "";
  }
}

/** Rendered manifests were rejected by the API server. */
export class ValidationError extends OrchestratorError {
  override readonly name = "ValidationError";
  readonly details: string;

  constructor(message: string, details: string) {
    super("VALIDATION_FAILED", message);
    this.details = details;
  }
}

export class TimeoutError extends OrchestratorError {
  override readonly name = "TimeoutError";
  readonly target: string;
  readonly elapsedMs: number;
  readonly attempts: number;

  constructor(target: string, elapsedMs: number, attempts: number) {
    super("TIMEOUT", `${target} not ready after ${Math.round(elapsedMs / 1000)}s (${attempts} polls)`);
    this.target = target;
    this.elapsedMs = elapsedMs;
    this.attempts = attempts;
  }
}

/** A workload restarted more often than allowed while waiting: crash-looping, not starting. */
export class RestartLimitError extends OrchestratorError {
  override readonly name = "RestartLimitError";
  readonly workload: string;
  readonly restarts: number;
  readonly maxRestarts: number;
  readonly attempts: number;

  constructor(opts: { workload: string; restarts: number; maxRestarts: number; attempts: number }) {
    super("RESTART_LIMIT", `${opts.workload} restarted ${opts.restarts} times (max ${opts.maxRestarts})`);
    this.workload = opts.workload;
    this.restarts = opts.restarts;
    this.maxRestarts = opts.maxRestarts;
    this.attempts = opts.attempts;
  }
}

export class CancelledError extends OrchestratorError {
  override readonly name = "CancelledError";
  readonly reason: string;
  readonly attempts: number;

  constructor(reason: string, attempts = 0) {
    super("CANCELLED", `Cancelled: ${reason}`);
    this.reason = reason;
    this.attempts = attempts;
  }
}

export class ConfigError extends OrchestratorError {
  override readonly name = "ConfigError";

  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

/** Normalize anything thrown into an OrchestratorError. */
export function toOrchestratorError(e: unknown, action = "stage"): OrchestratorError {
  if (e instanceof OrchestratorError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new ExecutionError({ action, exitCode: 1, stderr: message });
}

/** Reason carried by an aborted signal, as text. */
export function abortReason(signal: AbortSignal | undefined): string {
  const reason: unknown = signal?.reason;
  if (reason instanceof CancelledError) return reason.reason;
  if (reason instanceof Error) return reason.message;
  if (typeof reason === "string") return reason;
  return "aborted";
}
