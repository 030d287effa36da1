import type { LogLevel, Logger } from "../../core/ports/logger.js";
import { formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

/** Where formatted lines go. warn and above use `err`. */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export const stdioSink: LogSink = {
  out: (line) => {
    process.stdout.write(line);
  },
  err: (line) => {
    process.stderr.write(line);
  },
};

export interface LoggerOptions {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
  readonly bindings?: Record<string, unknown> | undefined;
  readonly sink?: LogSink | undefined;
}

/**
 * Format a log entry as structured JSON (for Datadog, ELK, CloudWatch, etc.).
 */
const formatJsonEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string => {
  const entry: Record<string, unknown> = {
    level,
    msg,
    time: new Date().toISOString(),
    ...meta,
  };
  return `${JSON.stringify(entry)}\n`;
};

/**
 * Logger with pretty and JSON output.
 * - "pretty": ANSI-colored human-readable output (default, for development)
 * - "json": structured JSON lines (for production log aggregators)
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const minLevel = options.level ?? "info";
  const format = options.format ?? "pretty";
  const bindings = options.bindings ?? {};
  const sink = options.sink ?? stdioSink;
  const minPriority = LEVEL_PRIORITY[minLevel];

  const formatter = format === "json" ? formatJsonEntry : formatLogEntry;

  const write = (level: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const line = formatter(level, msg, { ...bindings, ...meta });

    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) {
      sink.err(line);
    } else {
      sink.out(line);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger({ level: minLevel, format, sink, bindings: { ...bindings, ...extra } }),
  };
};
