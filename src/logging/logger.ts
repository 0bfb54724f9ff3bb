/**
 * Logging Subsystem
 *
 * Structured, levelled logging with subsystem names and pluggable transports.
 * The console transport is for operator output; the file transport appends the
 * human-readable event logs kept under the state directory.
 */

import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Log entry structure
 */
export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  instance?: string;
  category?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogLevel): void;
  isLevelEnabled(level: LogLevel): boolean;
  /** Flush and close every transport (file streams in particular). */
  close(): Promise<void>;
}

/**
 * Log context carried by `withContext()` loggers
 */
export type LogContext = {
  instance?: string;
  category?: string;
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Formatters
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local wall-clock timestamp, `YYYY-MM-DD HH:MM:SS`.
 */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/**
 * Default log formatter with color support
 */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: "iso" | "local" | false;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stdout.isTTY ?? false,
    timestamps = "iso",
    includeMetadata = true,
  } = options ?? {};

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps === "iso") {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    } else if (timestamps === "local") {
      parts.push(`[${formatLocalTimestamp(entry.timestamp)}]`);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.instance) contextParts.push(`instance=${entry.instance}`);
    if (entry.category) contextParts.push(`category=${entry.category}`);
    if (contextParts.length > 0) {
      const ctx = contextParts.join(" ");
      parts.push(colors ? `${COLORS.dim}(${ctx})${COLORS.reset}` : `(${ctx})`);
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

/**
 * Formatter for the append-only event logs: `[YYYY-MM-DD HH:MM:SS] LEVEL [subsystem] message`.
 */
export function createEventLogFormatter(): LogFormatter {
  return createDefaultFormatter({ colors: false, timestamps: "local", includeMetadata: true });
}

// =============================================================================
// Console Transport
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter({ timestamps: false });
    this.minLevel = options?.minLevel ?? "trace";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

// =============================================================================
// File Transport
// =============================================================================

/**
 * Appends formatted entries to a file. The parent directory is created on the
 * first write. If the file cannot be opened or written, the transport reports
 * it once through `onError` and drops every later entry.
 */
export class FileTransport implements LogTransport {
  name = "file";
  readonly filePath: string;
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private onError: (error: Error) => void;
  private stream: WriteStream | null = null;
  private failed = false;

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: LogLevel;
    onError?: (error: Error) => void;
  }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createEventLogFormatter();
    this.minLevel = options.minLevel ?? "trace";
    this.onError =
      options.onError ??
      ((error) => console.error(`Event log ${this.filePath} unavailable, entries dropped: ${error.message}`));
  }

  write(entry: LogEntry): void {
    if (this.failed || !shouldLog(entry.level, this.minLevel)) return;
    this.open()?.write(`${this.formatter(entry)}\n`);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => {
      stream.once("close", () => resolve());
      stream.end();
    });
  }

  private open(): WriteStream | null {
    if (this.stream) return this.stream;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
    } catch (err) {
      this.fail(err instanceof Error ? err : new Error(String(err)));
      return null;
    }
    const stream = createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", (err) => {
      if (this.stream === stream) this.stream = null;
      this.fail(err);
    });
    this.stream = stream;
    return stream;
  }

  private fail(error: Error): void {
    if (this.failed) return;
    this.failed = true;
    this.onError(error);
  }
}

// =============================================================================
// Memory Transport
// =============================================================================

/**
 * Keeps entries in memory; used by tests and dry runs.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class LoggerImpl implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): Logger {
    return new LoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): Logger {
    return new LoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  async close(): Promise<void> {
    for (const transport of this.transports) {
      await transport.close?.();
    }
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      instance: this.context.instance,
      category: this.context.category,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Logger Factory
// =============================================================================

/** Webhook URLs carry their secret in the path. */
export const DEFAULT_REDACT_PATTERNS = ["https://hooks\\.slack\\.com/services/[^\\s\"']+"];

export type LoggerOptions = {
  level?: LogLevel;
  /** Append-only event log file; omitted means console only. */
  filePath?: string;
  /** Disable the console transport (file-only logging). */
  console?: boolean;
  redactPatterns?: string[];
  transports?: LogTransport[];
};

export function createLogger(subsystem: string, options: LoggerOptions = {}): Logger {
  const transports: LogTransport[] = [...(options.transports ?? [])];
  if (options.console !== false) {
    transports.push(new ConsoleTransport());
  }
  if (options.filePath) {
    transports.push(new FileTransport({ filePath: options.filePath }));
  }

  return new LoggerImpl({
    subsystem,
    level: options.level ?? "info",
    transports,
    redactPatterns: options.redactPatterns ?? DEFAULT_REDACT_PATTERNS,
  });
}

/**
 * Logger that records into memory only.
 */
export function createMemoryLogger(subsystem = "test"): { logger: Logger; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const logger = createLogger(subsystem, { console: false, level: "trace", transports: [transport] });
  return { logger, transport };
}
