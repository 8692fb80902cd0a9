/**
 * Run Logger - Structured run log passed explicitly through the pipeline
 *
 * Entries are single-line JSON appended to an optional log file; warnings
 * and errors are echoed to stderr. Options are plain data so each worker
 * thread can build its own logger.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LogEntry, LogLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface LoggerOptions {
  level: LogLevel;
  /** JSON-lines log file; omitted means console only */
  filePath?: string;
  /** Rotate the log file when it reaches this many bytes */
  maxSize: number;
  /** Echo info entries to stdout as well as warnings and errors to stderr */
  verbose: boolean;
  /** Disable console echo entirely (worker threads, tests) */
  quiet: boolean;
}

export const DEFAULT_LOGGER_OPTIONS: LoggerOptions = {
  level: 'info',
  maxSize: 10 * 1024 * 1024,
  verbose: false,
  quiet: false
};

export interface LogReadOptions {
  limit?: number;         // Default: 50
  level?: LogLevel;
  since?: Date;
}

export class RunLogger {
  readonly options: LoggerOptions;
  private bindings: Record<string, unknown>;

  constructor(options: Partial<LoggerOptions> = {}, bindings: Record<string, unknown> = {}) {
    this.options = {
      level: options.level ?? DEFAULT_LOGGER_OPTIONS.level,
      filePath: options.filePath,
      maxSize: options.maxSize ?? DEFAULT_LOGGER_OPTIONS.maxSize,
      verbose: options.verbose ?? DEFAULT_LOGGER_OPTIONS.verbose,
      quiet: options.quiet ?? DEFAULT_LOGGER_OPTIONS.quiet
    };
    this.bindings = bindings;
  }

  /**
   * Logger sharing this one's output with extra context on every entry
   */
  child(bindings: Record<string, unknown>): RunLogger {
    return new RunLogger(this.options, { ...this.bindings, ...bindings });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Write an entry. Never throws: a failed write is reported on stderr
   * and the run continues.
   */
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const merged = { ...this.bindings, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message
    };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    this.echo(entry);

    if (!this.options.filePath) {
      return;
    }
    try {
      this.ensureLogDirectory(this.options.filePath);
      if (this.shouldRotate(this.options.filePath)) {
        this.rotate();
      }
      fs.appendFileSync(this.options.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      console.error(`Warning: Failed to write run log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Move the current log file aside under a timestamped name
   */
  rotate(): void {
    const logPath = this.options.filePath;
    if (!logPath || !fs.existsSync(logPath)) {
      return;
    }
    try {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(logPath, `${logPath}.${timestamp}`);
    } catch (error) {
      console.error(`Warning: Failed to rotate run log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Read entries back from the log file, most recent last
   */
  read(options?: LogReadOptions): LogEntry[] {
    const logPath = this.options.filePath;
    if (!logPath || !fs.existsSync(logPath)) {
      return [];
    }

    let lines: string[];
    try {
      lines = fs.readFileSync(logPath, 'utf-8').split('\n').filter(line => line.length > 0);
    } catch (error) {
      console.error(`Warning: Failed to read run log: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
    const entries: LogEntry[] = [];
    for (const line of lines) {
      const entry = parseEntry(line);
      if (entry) {
        entries.push(entry);
      }
    }

    let filtered = entries;
    const minimum = options?.level;
    if (minimum) {
      filtered = filtered.filter(e => LEVEL_ORDER[e.level] >= LEVEL_ORDER[minimum]);
    }
    const since = options?.since;
    if (since) {
      filtered = filtered.filter(e => new Date(e.timestamp) >= since);
    }

    const limit = options?.limit ?? 50;
    return filtered.length > limit ? filtered.slice(-limit) : filtered;
  }

  private echo(entry: LogEntry): void {
    if (this.options.quiet) {
      return;
    }
    const suffix = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    if (entry.level === 'error') {
      console.error(`Error: ${entry.message}${suffix}`);
    } else if (entry.level === 'warn') {
      console.error(`Warning: ${entry.message}${suffix}`);
    } else if (this.options.verbose) {
      console.log(`${entry.message}${suffix}`);
    }
  }

  private ensureLogDirectory(logPath: string): void {
    const logDir = path.dirname(logPath);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
  }

  private shouldRotate(logPath: string): boolean {
    if (!fs.existsSync(logPath)) {
      return false;
    }
    return fs.statSync(logPath).size >= this.options.maxSize;
  }
}

function parseEntry(line: string): LogEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  if (
    typeof value === 'object' && value !== null &&
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'level' in value && isLevel(value.level) &&
    'message' in value && typeof value.message === 'string'
  ) {
    const entry: LogEntry = { timestamp: value.timestamp, level: value.level, message: value.message };
    if ('context' in value && typeof value.context === 'object' && value.context !== null) {
      entry.context = { ...value.context };
    }
    return entry;
  }
  return null;
}

function isLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}
