/**
 * Structured logging for addon-sync runs
 *
 * Entries are formatted once (human-readable or JSON) and handed to every
 * configured writer, so the console and the per-run log file see the same
 * lines.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Destination for formatted log lines
 */
export interface LogWriter {
  write(level: LogLevel, line: string): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Where lines go (default: console) */
  writers?: LogWriter[];
  /** Context merged into every entry */
  context?: Record<string, unknown>;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_VALUES;
}

// =============================================================================
// Writers
// =============================================================================

/**
 * Writes errors to stderr and everything else to stdout
 */
export const consoleWriter: LogWriter = {
  write(level, line) {
    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  },
};

/**
 * Appends lines to a file, creating its directory on first use
 *
 * Write failures never reach the caller. The first one is kept in `failure`
 * and passed to `onError`; later lines are still attempted.
 */
export class FileLogWriter implements LogWriter {
  private ready = false;
  private lastFailure: Error | null = null;

  constructor(
    readonly path: string,
    private readonly onError?: (error: Error) => void
  ) {}

  get failure(): Error | null {
    return this.lastFailure;
  }

  write(_level: LogLevel, line: string): void {
    try {
      if (!this.ready) {
        mkdirSync(dirname(this.path), { recursive: true });
        this.ready = true;
      }
      appendFileSync(this.path, line + '\n', 'utf-8');
    } catch (err) {
      if (this.lastFailure) return;
      this.lastFailure = err instanceof Error ? err : new Error(String(err));
      this.onError?.(this.lastFailure);
    }
  }
}

/**
 * Keeps lines in memory; used by tests and JSON output
 */
export class MemoryLogWriter implements LogWriter {
  readonly lines: Array<{ level: LogLevel; line: string }> = [];

  write(level: LogLevel, line: string): void {
    this.lines.push({ level, line });
  }
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Per-run log file path, e.g. logs/addon-sync_2024-05-01_13-45-10.log
 */
export function runLogPath(logDir: string, now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}` +
    `_${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return join(logDir, `addon-sync_${stamp}.log`);
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: Required<Omit<LoggerConfig, 'context'>>;
  private readonly context: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      writers: config.writers ?? [consoleWriter],
    };
    this.context = config.context ?? {};
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const merged = { ...this.context, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  private format(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) return;
    const line = this.format(this.createEntry(level, message, context, error));
    for (const writer of this.config.writers) {
      writer.write(level, line);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({ ...this.config, context: { ...this.context, ...context } });
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

const envLevel = process.env.ADDON_SYNC_LOG_LEVEL;

export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : undefined,
  json: process.env.ADDON_SYNC_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
