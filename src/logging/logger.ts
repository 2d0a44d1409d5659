import { appendFile, stat, rename, unlink, mkdir, access, constants } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Log levels in order of severity (higher = more severe).
 * `silent` is only meaningful as a threshold: nothing is written at it.
 */
export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogThreshold = keyof typeof LOG_LEVELS;

export type LogLevel = Exclude<LogThreshold, 'silent'>;

/**
 * Context information for log entries
 */
export interface LogContext {
  tool?: string;
  callId?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  stack?: string;
}

/**
 * Logger configuration options.
 * A `null` path writes entries to stderr instead of a file.
 */
export interface LoggerConfig {
  level: LogThreshold;
  path: string | null;
  maxSize: number;
  maxFiles: number;
}

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: null,
  maxSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
};

/**
 * Logger - Structured JSON logger with level filtering and rotation
 *
 * Log calls return immediately. Entries are appended in call order on an
 * internal write queue; await {@link Logger.flush} to know they reached disk.
 */
export class Logger {
  private config: LoggerConfig;
  private defaultContext: LogContext;
  private sink: { tail: Promise<void> } = { tail: Promise.resolve() };

  /**
   * Creates a new Logger instance
   * @param config - Logger configuration
   * @param defaultContext - Default context to include in all log entries
   */
  constructor(config: Partial<LoggerConfig> = {}, defaultContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.defaultContext = defaultContext;
  }

  /**
   * A logger that discards everything
   */
  static silent(): Logger {
    return new Logger({ level: 'silent' });
  }

  /**
   * Gets the current log level
   */
  get level(): LogThreshold {
    return this.config.level;
  }

  /**
   * Sets the log level
   */
  set level(level: LogThreshold) {
    this.config.level = level;
  }

  /**
   * Gets the log file path, `null` when logging to stderr
   */
  get path(): string | null {
    return this.config.path;
  }

  /**
   * Checks if a log level should be written based on current config
   */
  shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Creates a child logger with additional default context.
   * The child shares the parent's configuration and write queue.
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.config, {
      ...this.defaultContext,
      ...context,
    });
    childLogger.config = this.config;
    childLogger.sink = this.sink;
    return childLogger;
  }

  /**
   * Formats a log entry
   */
  formatEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedContext = { ...this.defaultContext, ...context };
    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext;
    }

    if (error?.stack) {
      entry.stack = error.stack;
    }

    return entry;
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.enqueue(this.formatEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.enqueue(this.formatEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.enqueue(this.formatEntry('warn', message, context));
  }

  /**
   * Logs an error message with stack trace
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const err = error instanceof Error ? error : undefined;
    const entry = this.formatEntry('error', message, context, err);

    if (error !== undefined && !(error instanceof Error)) {
      entry.context = {
        ...entry.context,
        errorDetails: String(error),
      };
    }

    this.enqueue(entry);
  }

  /**
   * Resolves once every entry logged so far has been written
   */
  flush(): Promise<void> {
    return this.sink.tail;
  }

  /**
   * Writes a log entry to the configured output
   */
  async write(entry: LogEntry): Promise<void> {
    const line = JSON.stringify(entry) + '\n';

    if (this.config.path === null) {
      process.stderr.write(line);
      return;
    }

    const dir = dirname(this.config.path);
    if (dir && dir !== '.') {
      await mkdir(dir, { recursive: true });
    }

    await this.rotateIfNeeded(this.config.path);
    await appendFile(this.config.path, line, { encoding: 'utf-8' });
  }

  /**
   * Rotates the log file if it has reached maxSize
   */
  async rotateIfNeeded(path: string): Promise<void> {
    if (!(await exists(path))) {
      return;
    }
    const stats = await stat(path);
    if (stats.size >= this.config.maxSize) {
      await this.rotate(path);
    }
  }

  /**
   * Performs log rotation, keeping at most maxFiles rotated files
   */
  async rotate(path: string): Promise<void> {
    const oldestPath = `${path}.${this.config.maxFiles}`;
    if (await exists(oldestPath)) {
      await unlink(oldestPath);
    }

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${path}.${i}`;
      if (await exists(oldPath)) {
        await rename(oldPath, `${path}.${i + 1}`);
      }
    }

    if (await exists(path)) {
      await rename(path, `${path}.1`);
    }
  }

  /**
   * Lists all log files (current + rotated)
   */
  async listLogFiles(): Promise<string[]> {
    const path = this.config.path;
    if (path === null) {
      return [];
    }

    const candidates = [path];
    for (let i = 1; i <= this.config.maxFiles; i++) {
      candidates.push(`${path}.${i}`);
    }

    const files: string[] = [];
    for (const candidate of candidates) {
      if (await exists(candidate)) {
        files.push(candidate);
      }
    }
    return files;
  }

  private enqueue(entry: LogEntry): void {
    this.sink.tail = this.sink.tail
      .then(() => this.write(entry))
      .catch((error: unknown) => {
        process.stderr.write(`logger: failed to write entry: ${String(error)}\n`);
      });
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
