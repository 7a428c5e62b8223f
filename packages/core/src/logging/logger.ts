import type { LogFormat, LogLevel } from "../config/types.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogEntry = {
  level: LogLevel;
  subsystem: string;
  message: string;
  data?: Record<string, unknown>;
  ts: string;
};

export type LogOutput = (entry: LogEntry) => void;

export class Logger {
  private subsystem: string;
  private readonly level: LogLevel;
  private output: LogOutput;

  constructor(subsystem: string, level: LogLevel = "info", output?: LogOutput) {
    this.subsystem = subsystem;
    this.level = level;
    this.output = output ?? prettyOutput;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  child(subsystem: string): Logger {
    return new Logger(`${this.subsystem}:${subsystem}`, this.level, this.output);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return;
    this.output({
      level,
      subsystem: this.subsystem,
      message,
      data,
      ts: new Date().toISOString(),
    });
  }
}

function write(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function prettyOutput(entry: LogEntry): void {
  const prefix = `[${entry.ts}] [${entry.level.toUpperCase()}] [${entry.subsystem}]`;
  const msg = entry.data ? `${entry.message} ${JSON.stringify(entry.data)}` : entry.message;
  write(entry.level, `${prefix} ${msg}`);
}

export function jsonOutput(entry: LogEntry): void {
  write(entry.level, JSON.stringify(entry));
}

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  output?: LogOutput;
};

export function createLogger(subsystem: string, options: LoggerOptions = {}): Logger {
  const output = options.output ?? (options.format === "json" ? jsonOutput : prettyOutput);
  return new Logger(subsystem, options.level, output);
}

/** Turns an unknown thrown value into loggable fields, following `cause` chains one level. */
export function errorData(err: unknown): Record<string, unknown> {
  if (!(err instanceof Error)) return { error: String(err) };
  const data: Record<string, unknown> = { error: err.message, errorName: err.name };
  if (err.cause !== undefined) {
    data.cause = err.cause instanceof Error ? err.cause.message : String(err.cause);
  }
  return data;
}
