export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "human" | "jsonl";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(code: string, message: string, fields?: LogFields): void;
  info(code: string, message: string, fields?: LogFields): void;
  warn(code: string, message: string, fields?: LogFields): void;
  error(code: string, message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export type LogSink = { write(chunk: string): unknown };

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Line-oriented logger. `jsonl` emits one `{ level, code, message, ... }`
 * object per line, `human` emits `[entry] message`. Results go to stdout,
 * so the default sink is stderr.
 */
export function createLogger(opts: {
  format: LogFormat;
  level?: LogLevel;
  sink?: LogSink;
  bindings?: LogFields;
  now?: () => Date;
}): Logger {
  const sink = opts.sink ?? process.stderr;
  const min = LEVEL_ORDER[opts.level ?? "info"];
  const bindings = opts.bindings ?? {};
  const now = opts.now ?? (() => new Date());

  function emit(level: LogLevel, code: string, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < min) return;
    const merged = { ...bindings, ...fields };

    if (opts.format === "jsonl") {
      sink.write(JSON.stringify({ level, code, message, time: now().toISOString(), ...merged }) + "\n");
      return;
    }

    const scope = typeof merged.entry === "string" ? `[${merged.entry}] ` : "";
    const prefix = level === "warn" || level === "error" ? `${level.toUpperCase()} ` : "";
    sink.write(`${prefix}${scope}${message}\n`);
  }

  return {
    debug: (code, message, fields) => emit("debug", code, message, fields),
    info: (code, message, fields) => emit("info", code, message, fields),
    warn: (code, message, fields) => emit("warn", code, message, fields),
    error: (code, message, fields) => emit("error", code, message, fields),
    child: (extra) => createLogger({ ...opts, bindings: { ...bindings, ...extra } }),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
