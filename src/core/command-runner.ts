import { execFile } from "node:child_process";
import { CancelledError, ExecutionError, abortReason } from "../errors.js";
import { err, ok, type Result } from "../types/result.js";
import { silentLogger, type Logger } from "../log/logger.js";
import { timerMs } from "./clock.js";

/** One external operation. The runner does not interpret it, only invokes and observes. */
export type Action = {
  /** Short label used in logs and errors, e.g. "helm install". */
  name: string;
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Written to the child's stdin, e.g. manifests for `kubectl apply -f -`. */
  input?: string;
  timeoutMs?: number;
};

export type ActionOutput = {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
};

export interface CommandRunner {
  run(action: Action, signal?: AbortSignal): Promise<Result<ActionOutput, ExecutionError | CancelledError>>;
}

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const MAX_BUFFER = 50 * 1024 * 1024;

/**
 * Runs actions as child processes without a shell. A non-zero exit is
 * returned as ExecutionError, never thrown.
 */
export class ShellCommandRunner implements CommandRunner {
  private readonly logger: Logger;

  constructor(opts: { logger?: Logger } = {}) {
    this.logger = opts.logger ?? silentLogger;
  }

  run(action: Action, signal?: AbortSignal): Promise<Result<ActionOutput, ExecutionError | CancelledError>> {
    if (signal?.aborted) return Promise.resolve(err(new CancelledError(abortReason(signal))));

    const start = Date.now();
    this.logger.debug("EXEC", `${action.command} ${action.args.join(" ")}`, { action: action.name });

    return new Promise((resolve) => {
      const child = execFile(
        action.command,
        action.args,
        {
          cwd: action.cwd,
          env: { ...process.env, ...action.env },
          encoding: "utf8",
          maxBuffer: MAX_BUFFER,
          timeout: timerMs(action.timeoutMs ?? DEFAULT_TIMEOUT_MS),
          shell: false,
          signal,
        },
        (error, stdout, stderr) => {
          const durationMs = Date.now() - start;
          if (signal?.aborted) {
            resolve(err(new CancelledError(abortReason(signal))));
            return;
          }
          if (error) {
            resolve(err(new ExecutionError({ action: action.name, exitCode: exitCodeOf(error), stderr: stderr || error.message, stdout })));
            return;
          }
          resolve(ok({ exitCode: 0, stdout, stderr, durationMs }));
        },
      );

      if (action.input !== undefined && child.stdin) {
        // A child may exit without reading its input; its exit status decides the result.
        child.stdin.on("error", (e: Error) => {
          const code = "code" in e ? e.code : undefined;
          if (code !== "EPIPE") this.logger.warn("EXEC_STDIN", `${action.name}: writing input failed: ${e.message}`, { action: action.name });
        });
        child.stdin.end(action.input);
      }
    });
  }
}

function exitCodeOf(error: { code?: string | number | null }): number {
  if (typeof error.code === "number") return error.code;
  // spawn failures carry errno strings; ENOENT means the binary is missing
  return error.code === "ENOENT" ? 127 : 1;
}
