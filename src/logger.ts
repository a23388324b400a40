import { inspect } from "node:util";
import { ENV_DISABLE_LOG_ECHO } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  /** Dot-joined scope path, "" at the root. */
  scope: string;
  message: string;
  meta?: LogMeta;
}

export interface Logger {
  child(scope: string): Logger;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export type LogSink = (entry: LogEntry) => void;

const rank = (level: LogLevel) => LOG_LEVELS.indexOf(level);

/**
 * Drops entries below `minLevel` and hands the rest to `sink`. Children share
 * the sink and threshold.
 */
export class ScopedLogger implements Logger {
  constructor(
    private readonly sink: LogSink,
    private readonly minLevel: LogLevel = "debug",
    private readonly scope = "",
  ) {}

  child(scope: string): Logger {
    return new ScopedLogger(
      this.sink,
      this.minLevel,
      this.scope ? `${this.scope}.${scope}` : scope,
    );
  }

  private emit(level: LogLevel, message: string, meta?: LogMeta): void {
    if (rank(level) < rank(this.minLevel)) return;
    const entry: LogEntry = { level, scope: this.scope, message };
    if (meta && Object.keys(meta).length > 0) entry.meta = meta;
    this.sink(entry);
  }

  debug(message: string, meta?: LogMeta): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.emit("error", message, meta);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

function metaText(meta: LogMeta): string {
  try {
    return JSON.stringify(meta);
  } catch {
    // cycles, bigints
    return inspect(meta, { depth: 4, breakLength: Infinity });
  }
}

/** `WARN  [diff] compare failed {"path":"a.txt"}` */
export function formatLogLine({ level, scope, message, meta }: LogEntry): string {
  const head = level.toUpperCase().padEnd(5);
  const where = scope ? ` [${scope}]` : "";
  const tail = meta ? ` ${metaText(meta)}` : "";
  return `${head}${where} ${message}${tail}`;
}

function echoDisabled(): boolean {
  const raw = process.env[ENV_DISABLE_LOG_ECHO]?.trim().toLowerCase();
  return !!raw && raw !== "0" && raw !== "false";
}

// stdout is reserved for the summary table
const stderrSink: LogSink = (entry) => {
  if (echoDisabled()) return;
  console.error(formatLogLine(entry));
};

/** Logger used by the CLI: every entry at or above `minLevel` goes to stderr. */
export class ConsoleLogger extends ScopedLogger {
  constructor(minLevel: LogLevel = "info") {
    super(stderrSink, minLevel);
  }
}

function isLogLevel(raw: string): raw is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === raw);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
