/**
 * Logger Service for the Track Genre Classifier
 *
 * Structured logging with log levels, error categorization, in-memory
 * retrieval, an optional console echo and optional daily log files.
 *
 * Log levels: ERROR (fatal failures), WARN (failed attempts, exhausted batches),
 * INFO (progress)
 *
 * Default log directory: %APPDATA%/track-genre-classifier/logs/
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ClassifierError, isClassifierError, ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Log severity level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** Track being processed when the log was created (if applicable) */
  trackId: string | null;
  /** Workflow step where the log was created (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
  cause: string | null;
}

/** Context fields accepted by the logging methods */
export interface LogContext {
  category?: ErrorCategory;
  trackId?: string;
  step?: string;
  cause?: string;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to %APPDATA%/track-genre-classifier/logs/ */
  logDir?: string;
  /** Minimum log level to record (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to false */
  writeToFile?: boolean;
  /** Sink for console output; entries are echoed when set */
  console?: (line: string) => void;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

/** Summary of log entries for display */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  /** Breakdown of errors and warnings by category */
  issuesByCategory: Record<string, number>;
  /** Log file path (if file logging is enabled) */
  logFilePath: string | null;
}

/** Filter options for retrieving log entries */
export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
  step?: string;
  /** Maximum number of entries to return (most recent) */
  limit?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'track-genre-classifier';
const LOG_DIR_NAME = 'logs';
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory path.
 * On Windows: %APPDATA%/track-genre-classifier/logs/
 * On other platforms: ~/.config/track-genre-classifier/logs/
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Generates a log filename (YYYY-MM-DD.log) from a Date.
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single line.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | trackId: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [`[${entry.timestamp}]`, entry.level];

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.trackId) {
    parts.push(`| trackId: ${entry.trackId}`);
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
 * Creates a LogEntry from a generic message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: context?.category ?? null,
    trackId: context?.trackId ?? null,
    step: context?.step ?? null,
    cause: context?.cause ?? null,
  };
}

/**
 * Creates a LogEntry from a ClassifierError.
 */
export function createLogEntryFromError(
  error: ClassifierError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  return createLogEntry(
    level,
    error.message,
    {
      category: error.category,
      trackId: error.trackId ?? undefined,
      step: error.step,
      cause: error.cause?.message,
    },
    getCurrentDate,
  );
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for the classifier.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ console: console.log });
 * await logger.initialize();
 * logger.info('Processing batch 1/3 (25 tracks)', { step: 'classify' });
 * logger.logClassifierError(new TransportFailure('HTTP 429', { provider: 'openai' }), 'WARN');
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly maxFileSize: number;
  private readonly consoleSink: ((line: string) => void) | null;
  private readonly getCurrentDate: () => Date;
  private writeToFile: boolean;

  private entries: LogEntry[] = [];
  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? false;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.consoleSink = options?.console ?? null;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it cannot be created, file logging
   * is turned off and a WARN entry records why.
   */
  async initialize(): Promise<void> {
    if (this.writeToFile) {
      try {
        await fs.promises.mkdir(this.logDir, { recursive: true });
      } catch (error: unknown) {
        this.writeToFile = false;
        const message = error instanceof Error ? error.message : String(error);
        this.warn(`Failed to create log directory "${this.logDir}": ${message}. File logging disabled.`);
      }
    }
    this.initialized = true;
  }

  /** Returns the current log file path based on today's date. */
  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  /**
   * Logs a ClassifierError with its category, step and cause.
   */
  logClassifierError(error: ClassifierError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs any error. ClassifierError context is preserved; anything else
   * becomes a plain entry with the given step.
   */
  logError(error: unknown, context?: { step?: string; trackId?: string }, level: LogLevel = 'ERROR'): void {
    if (isClassifierError(error)) {
      this.logClassifierError(error, level);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.log(level, message, context);
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, context, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    const line = formatLogEntry(entry);
    this.consoleSink?.(line);
    if (this.writeToFile && this.initialized) {
      this.writeLineToFile(line);
    }
  }

  /**
   * Appends a line to today's log file, rotating when it exceeds maxFileSize.
   * A write failure turns file logging off for the rest of the session.
   */
  private writeLineToFile(line: string): void {
    const logFilePath = this.getLogFilePath();
    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }
      fs.appendFileSync(logFilePath, line + '\n', 'utf-8');
    } catch (error: unknown) {
      this.writeToFile = false;
      const message = error instanceof Error ? error.message : String(error);
      this.entries.push(
        createLogEntry(
          'WARN',
          `Failed to write log file "${logFilePath}": ${message}. File logging disabled.`,
          undefined,
          this.getCurrentDate,
        ),
      );
    }
  }

  /**
   * Renames a full log file with the next free numeric suffix,
   * e.g. 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    while (fs.existsSync(`${base}.${rotationIndex}${ext}`)) {
      rotationIndex++;
    }
    fs.renameSync(logFilePath, `${base}.${rotationIndex}${ext}`);
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  /**
   * Returns in-memory log entries, optionally filtered.
   */
  getEntries(filter?: LogFilter): LogEntry[] {
    let entries = [...this.entries];

    if (filter?.level) {
      entries = entries.filter((e) => e.level === filter.level);
    }
    if (filter?.category) {
      entries = entries.filter((e) => e.category === filter.category);
    }
    if (filter?.step) {
      entries = entries.filter((e) => e.step === filter.step);
    }
    if (filter?.limit && filter.limit > 0) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  getWarnings(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'WARN', limit });
  }

  getErrors(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'ERROR', limit });
  }

  /**
   * Returns counts per level and per error category.
   */
  getSummary(): LogSummary {
    const issuesByCategory: Record<string, number> = {};
    let errorCount = 0;
    let warnCount = 0;
    let infoCount = 0;

    for (const entry of this.entries) {
      switch (entry.level) {
        case 'ERROR':
          errorCount++;
          break;
        case 'WARN':
          warnCount++;
          break;
        case 'INFO':
          infoCount++;
          break;
      }
      if (entry.level !== 'INFO' && entry.category) {
        issuesByCategory[entry.category] = (issuesByCategory[entry.category] ?? 0) + 1;
      }
    }

    return {
      totalEntries: this.entries.length,
      errorCount,
      warnCount,
      infoCount,
      issuesByCategory,
      logFilePath: this.writeToFile ? this.getLogFilePath() : null,
    };
  }
}
