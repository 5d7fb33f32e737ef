/**
 * Logging Subsystem
 *
 * Structured logging with log levels, subsystems and pluggable
 * transports. The CLI logger fans every entry out to standard output
 * and to an append-only log file.
 */

import { createWriteStream, type WriteStream } from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

export interface Logger {
  readonly subsystem: string;

  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;

  /** Flush and close every transport. */
  close(): Promise<void>;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
};

/**
 * `2026-01-15T10:00:00.000Z INFO  [glacier/restore] message {"meta":1}`
 */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);

    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);

    parts.push(entry.message);

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Console Transport
// =============================================================================

/**
 * Writes every level to standard output, one line per entry.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private stream: { write: (chunk: string) => unknown };

  constructor(options?: {
    formatter?: LogFormatter;
    minLevel?: LogLevel;
    stream?: { write: (chunk: string) => unknown };
  }) {
    this.stream = options?.stream ?? process.stdout;
    this.formatter =
      options?.formatter ?? createDefaultFormatter({ colors: process.stdout.isTTY ?? false });
    this.minLevel = options?.minLevel ?? "info";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;
    this.stream.write(`${this.formatter(entry)}\n`);
  }
}

// =============================================================================
// File Transport
// =============================================================================

/**
 * Append-only file transport. The file is opened on the first write; a
 * stream error stops further writes and is raised by `close()`.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private filePath: string;
  private writeStream: WriteStream | null = null;
  private failure: Error | null = null;

  constructor(options: { filePath: string; formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.filePath = options.filePath;
    this.formatter =
      options.formatter ??
      createDefaultFormatter({
        colors: false,
        timestamps: true,
        includeMetadata: true,
      });
    this.minLevel = options.minLevel ?? "info";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel) || this.failure) return;
    if (!this.writeStream) {
      this.writeStream = createWriteStream(this.filePath, { flags: "a" });
      this.writeStream.on("error", (err) => {
        if (!this.failure) this.failure = err;
      });
    }
    this.writeStream.write(`${this.formatter(entry)}\n`);
  }

  async close(): Promise<void> {
    const stream = this.writeStream;
    this.writeStream = null;
    if (stream && !this.failure) {
      await new Promise<void>((resolve, reject) => {
        stream.once("error", reject);
        stream.end((err?: Error | null) => (err ? reject(err) : resolve()));
      });
    }
    if (this.failure) {
      throw this.failure;
    }
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class LoggerImpl implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];

  constructor(options: { subsystem: string; level?: LogLevel; transports?: LogTransport[] }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
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

  async close(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.close?.()));
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      metadata: meta,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export type CliLoggerOptions = {
  subsystem: string;
  /** Append log lines to this file as well as standard output. */
  logFile?: string;
  level?: LogLevel;
};

/**
 * Logger for a CLI run: standard output plus an optional log file.
 */
export function createCliLogger(options: CliLoggerOptions): Logger {
  const level = options.level ?? "info";
  const transports: LogTransport[] = [new ConsoleTransport({ minLevel: level })];
  if (options.logFile) {
    transports.push(new FileTransport({ filePath: options.logFile, minLevel: level }));
  }

  return new LoggerImpl({
    subsystem: options.subsystem,
    level,
    transports,
  });
}
