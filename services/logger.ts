/**
 * Logging Service
 *
 * Contextual logging with:
 * - Log levels (debug, info, warn, error)
 * - `[Context]` prefixes and child loggers
 * - Sinks for structured entries (log files, reports)
 *
 * Loggers are plain values passed to each component; a child shares
 * its parent's sinks, so a run wires its file sink once at the root.
 */

import fs from 'fs';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  context: string;
  message: string;
  data?: unknown;
}

export type LogCallback = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  return LEVEL_NAMES[value.trim().toLowerCase()];
}

function getDefaultLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const explicit = parseLogLevel(env.LOG_LEVEL);
  if (explicit !== undefined) return explicit;
  if (env.NODE_ENV === 'production') return LogLevel.WARN;
  if (env.NODE_ENV === 'test') return LogLevel.ERROR;
  return LogLevel.DEBUG;
}

export class Logger {
  private level: LogLevel;
  private readonly context: string;
  private readonly callbacks: LogCallback[];
  private readonly console: boolean;

  constructor(
    context: string = 'App',
    options: { level?: LogLevel; callbacks?: LogCallback[]; console?: boolean } = {}
  ) {
    this.context = context;
    this.level = options.level ?? getDefaultLevel();
    this.callbacks = options.callbacks ?? [];
    this.console = options.console ?? true;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level < this.level) return;

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      context: this.context,
      message,
      data,
    };

    this.callbacks.forEach(cb => cb(entry));

    if (!this.console) return;

    const prefix = `[${this.context}]`;
    const args = data !== undefined ? [prefix, message, data] : [prefix, message];

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(...args);
        break;
      case LogLevel.INFO:
        console.info(...args);
        break;
      case LogLevel.WARN:
        console.warn(...args);
        break;
      case LogLevel.ERROR:
        console.error(...args);
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data);
  }

  /** Create a child logger with a sub-context; sinks are shared */
  child(subContext: string): Logger {
    return new Logger(`${this.context}:${subContext}`, {
      level: this.level,
      callbacks: this.callbacks,
      console: this.console,
    });
  }

  /** Set the minimum log level */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Add a sink for structured entries */
  addCallback(callback: LogCallback): void {
    this.callbacks.push(callback);
  }

  removeCallback(callback: LogCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index > -1) {
      this.callbacks.splice(index, 1);
    }
  }
}

export function createLogger(context: string, options?: { level?: LogLevel; console?: boolean }): Logger {
  return new Logger(context, options);
}

/**
 * `2026-01-01T00:00:00.000Z - Pipeline - INFO - message`
 */
export function formatLogLine(entry: LogEntry): string {
  const levelName = LogLevel[entry.level];
  const suffix = entry.data !== undefined ? ` ${stringifyData(entry.data)}` : '';
  return `${entry.timestamp} - ${entry.context} - ${levelName} - ${entry.message}${suffix}`;
}

function stringifyData(data: unknown): string {
  if (data instanceof Error) return data.stack ?? data.message;
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

/**
 * Append-only log file sink. Call `close()` before the process exits.
 *
 * A file that cannot be opened or written is reported once on the console;
 * the sink then drops further entries.
 */
export function createFileSink(filePath: string): { callback: LogCallback; close: () => Promise<void> } {
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
  let failed = false;

  stream.on('error', (error) => {
    if (failed) return;
    failed = true;
    console.error(`[Logger] Cannot write log file ${filePath}: ${error.message}`);
  });

  return {
    callback: (entry) => {
      if (failed) return;
      stream.write(`${formatLogLine(entry)}\n`);
    },
    close: () =>
      new Promise<void>((resolve) => {
        if (stream.closed) {
          resolve();
          return;
        }
        stream.once('close', () => resolve());
        stream.end();
      }),
  };
}
