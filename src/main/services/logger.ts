/**
 * Logger Service for tubetagger
 *
 * Structured logging with log levels, error categorization and PipelineError
 * integration. Entries are kept in memory for the end-of-run summary, can be
 * echoed to the terminal, and can be appended to a daily log file with size
 * rotation.
 *
 * Log levels: ERROR (item failures), WARN (skipped items), INFO (progress),
 * DEBUG (verbose diagnostics such as cover fetch failures)
 *
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ErrorCategory, PipelineError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** Source URL of the item being processed (if applicable) */
  url: string | null;
  /** Processing step where the log was created (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
  cause: string | null;
}

/** Optional context attached to a log message */
export interface LogContext {
  category?: ErrorCategory;
  url?: string;
  step?: string;
  cause?: string;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Null disables file logging. Defaults to null */
  logDir?: string | null;
  /** Minimum log level to record (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Receives every recorded entry with its formatted line (e.g. terminal output) */
  echo?: (line: string, entry: LogEntry) => void;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

/** Summary of log entries for display */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  debugCount: number;
  /** Breakdown of errors by category */
  errorsByCategory: Record<string, number>;
  /** Log file path (if file logging is enabled) */
  logFilePath: string | null;
}

// ─── Constants ───────────────────────────────────────────────────────────

/** Default maximum log file size (10MB) */
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Log level numeric values for comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Generates a log filename from a Date object.
 * Format: YYYY-MM-DD.log
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single-line string.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | url: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [];

  parts.push(`[${entry.timestamp}]`);
  parts.push(entry.level);

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.url) {
    parts.push(`| url: ${entry.url}`);
  }

  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }

  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/**
 * Checks if the given level meets the minimum level threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates an ERROR LogEntry from a PipelineError.
 *
 * @param error - The PipelineError to convert
 * @param itemUrl - URL recorded when the error carries none
 * @param getCurrentDate - Optional function to get current date (for testing)
 */
export function createLogEntryFromError(
  error: PipelineError,
  itemUrl?: string,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level: 'ERROR',
    message: error.message,
    category: error.category,
    url: error.url ?? itemUrl ?? null,
    step: error.step,
    cause: error.cause?.message ?? null,
  };
}

/**
 * Creates a LogEntry from a generic message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  options?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: options?.category ?? null,
    url: options?.url ?? null,
    step: options?.step ?? null,
    cause: options?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for tubetagger.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs', minLevel: 'DEBUG' });
 * await logger.initialize();
 * logger.info('Downloading', { url, step: 'downloading' });
 * logger.logPipelineError(new DownloadError('Video unavailable'), url);
 * ```
 */
export class Logger {
  private readonly logDir: string | null;
  private readonly minLevel: LogLevel;
  private readonly maxFileSize: number;
  private readonly echo: ((line: string, entry: LogEntry) => void) | null;
  private readonly getCurrentDate: () => Date;

  /** In-memory log entries for the current run */
  private readonly entries: LogEntry[] = [];

  /** Whether file output is active (log directory created) */
  private fileOutputReady = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? null;
    this.minLevel = options?.minLevel ?? 'INFO';
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.echo = options?.echo ?? null;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it cannot be created, file logging
   * is disabled and a WARN entry is recorded instead.
   */
  async initialize(): Promise<void> {
    if (this.logDir === null) return;

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
      this.fileOutputReady = true;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.warn(`Failed to create log directory "${this.logDir}": ${message}. File logging disabled.`);
    }
  }

  /**
   * Returns the current log file path, or null when file logging is off.
   */
  getLogFilePath(): string | null {
    if (this.logDir === null) return null;
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, options?: LogContext): void {
    this.log('ERROR', message, options);
  }

  warn(message: string, options?: LogContext): void {
    this.log('WARN', message, options);
  }

  info(message: string, options?: LogContext): void {
    this.log('INFO', message, options);
  }

  debug(message: string, options?: LogContext): void {
    this.log('DEBUG', message, options);
  }

  /**
   * Logs a PipelineError at ERROR with its category, step and cause.
   *
   * @param error - The PipelineError to log
   * @param itemUrl - URL of the work item, used when the error carries none
   */
  logPipelineError(error: PipelineError, itemUrl?: string): void {
    this.addEntry(createLogEntryFromError(error, itemUrl, this.getCurrentDate));
  }

  /**
   * Logs a skipped work item (WARN level).
   */
  logSkippedItem(url: string, reason: string): void {
    this.warn(`Item skipped: ${reason}`, { url, step: 'processing' });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, options?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, options, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    const line = formatLogEntry(entry);
    this.echo?.(line, entry);
    if (this.fileOutputReady) {
      this.writeLineToFile(line);
    }
  }

  /**
   * Appends a formatted line to the current log file, rotating it first when
   * it has reached maxFileSize. A failing write disables file output for the
   * rest of the run; entries stay available in memory.
   */
  private writeLineToFile(line: string): void {
    const logFilePath = this.getLogFilePath();
    if (logFilePath === null) return;

    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }
      fs.appendFileSync(logFilePath, line + '\n', 'utf-8');
    } catch (error: unknown) {
      this.fileOutputReady = false;
      const message = error instanceof Error ? error.message : String(error);
      this.entries.push(
        createLogEntry(
          'WARN',
          `Log file write failed: ${message}. File logging disabled.`,
          undefined,
          this.getCurrentDate,
        ),
      );
    }
  }

  /**
   * Rotates a log file by renaming it with a numeric suffix.
   * e.g., 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  /**
   * Returns a summary of the current log state.
   */
  getSummary(): LogSummary {
    const errorsByCategory: Record<string, number> = {};
    const counts: Record<LogLevel, number> = { ERROR: 0, WARN: 0, INFO: 0, DEBUG: 0 };

    for (const entry of this.entries) {
      counts[entry.level]++;
      if (entry.level === 'ERROR' && entry.category) {
        errorsByCategory[entry.category] = (errorsByCategory[entry.category] ?? 0) + 1;
      }
    }

    return {
      totalEntries: this.entries.length,
      errorCount: counts.ERROR,
      warnCount: counts.WARN,
      infoCount: counts.INFO,
      debugCount: counts.DEBUG,
      errorsByCategory,
      logFilePath: this.fileOutputReady ? this.getLogFilePath() : null,
    };
  }
}
