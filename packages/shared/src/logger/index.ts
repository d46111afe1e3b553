/**
 * Structured diagnostics logger.
 *
 * Diagnostics go to stderr and never mix with a command's own output.
 * LOG_LEVEL sets the threshold (default: info) and LOG_FORMAT=json switches
 * to one JSON object per line. Context set on a logger (cli name, command,
 * invocation id) is carried by every entry and inherited by child loggers.
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "text" | "json";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  cli?: string;
  command?: string;
  invocationId?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Default: LOG_LEVEL, else "info" */
  level?: LogLevel;
  /** Default: LOG_FORMAT, else "text" */
  format?: LogFormat;
  context?: LogContext;
  /** Receives each formatted line. Default: console.error */
  write?: (line: string) => void;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Whether entries at `level` are written; guards costly debug data. */
  isEnabled(level: LogLevel): boolean;
  child(name: string): Logger;
  /** Merge persistent context fields (cli, command, invocationId) */
  setContext(ctx: LogContext): void;
  /** Start a timer. The returned stop function logs the elapsed time at debug and returns it in ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function resolveFormat(explicit?: LogFormat): LogFormat {
  if (explicit) return explicit;
  return process.env.LOG_FORMAT?.toLowerCase() === "json" ? "json" : "text";
}

interface Entry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  context: LogContext;
  data?: Record<string, unknown>;
}

function hasData(data?: Record<string, unknown>): data is Record<string, unknown> {
  return data !== undefined && Object.keys(data).length > 0;
}

function formatJson({ timestamp, level, module, message, context, data }: Entry): string {
  const { cli, command, invocationId, ...extra } = context;
  return JSON.stringify({
    timestamp,
    level,
    module,
    message,
    ...(cli ? { cli } : {}),
    ...(command ? { command } : {}),
    ...(invocationId ? { invocation_id: invocationId } : {}),
    ...extra,
    ...data,
  });
}

/** `[ts] [LEVEL] [module] [demo#3f2a9c1e] message {"data":1}` */
function formatText({ timestamp, level, module, message, context, data }: Entry): string {
  const parts = [`[${timestamp}]`, `[${level.toUpperCase()}]`, `[${module}]`];
  if (context.cli) {
    parts.push(context.invocationId ? `[${context.cli}#${context.invocationId}]` : `[${context.cli}]`);
  }
  parts.push(message);
  if (hasData(data)) parts.push(JSON.stringify(data));
  return parts.join(" ");
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const level = resolveLevel(options.level);
  const format = resolveFormat(options.format);
  const write = options.write ?? ((line: string) => console.error(line));
  let context: LogContext = { ...options.context };

  const isEnabled = (candidate: LogLevel): boolean => LEVEL_PRIORITY[candidate] >= LEVEL_PRIORITY[level];

  function log(entryLevel: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!isEnabled(entryLevel)) return;

    const entry: Entry = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      module: name,
      message,
      context,
      data,
    };
    write(format === "json" ? formatJson(entry) : formatText(entry));
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    isEnabled,
    child: (childName) =>
      createLogger(`${name}:${childName}`, { level, format, write, context: { ...context } }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
