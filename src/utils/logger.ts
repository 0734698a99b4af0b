/**
 * Simple colored logger for terminal output
 */
import fs from 'node:fs';
import path from 'node:path';

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

// Log context (common fields for all logs)
type LogContext = {
  subscription?: string;
  target?: string;
};

/**
 * Event types attached to structured log metadata
 * Use this enum to categorize log events by the stage that produced them
 *
 * @example
 * ```bash
 * # Find all delivery failures
 * jq 'select(.meta.eventType == "DeliveryError")' logs/statuscast-*.json
 *
 * # Count events by type
 * jq '.meta.eventType' logs/statuscast-*.json | sort | uniq -c
 * ```
 */
export enum LogEvent {
  /** Platform adapter failed to produce a snapshot */
  FETCH_ERROR = 'FetchError',

  /** Snapshot could not be compared against the stored one */
  DIFF_ERROR = 'DiffError',

  /** State store write failed */
  COMMIT_ERROR = 'CommitError',

  /** Anything else thrown out of a cycle */
  CYCLE_ERROR = 'CycleError',

  /** Tick skipped because the previous cycle is still running */
  TICK_SKIPPED = 'TickSkipped',

  /** Change events detected by a cycle */
  CHANGE_DETECTED = 'ChangeDetected',

  /** Notification delivered */
  NOTIFICATION_SENT = 'NotificationSent',

  /** Notification channel rejected or failed a delivery */
  DELIVERY_ERROR = 'DeliveryError',

  /** Channel lifecycle (start/stop) */
  CHANNEL_LIFECYCLE = 'ChannelLifecycle',

  /** Heartbeat ping failed */
  HEARTBEAT_ERROR = 'HeartbeatError',

  /** Configuration rejected at load time */
  CONFIG_ERROR = 'ConfigError',
}

/**
 * Structured log metadata with required eventType field
 * Use this type for important logs (errors, notifications) to ensure
 * they include an event type for filtering
 *
 * For simple informational logs, you can use plain objects without eventType
 */
export interface StructuredLogMetadata {
  /** Event type (required for structured logs) */
  eventType: LogEvent;
  /** Additional metadata fields */
  [key: string]: unknown;
}

export type LogMetadata = StructuredLogMetadata;

/**
 * A log record handed to sinks
 */
export interface LogRecord {
  time: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  context?: LogContext;
  meta?: Record<string, unknown>;
}

export type LogSink = (record: LogRecord) => void;

/**
 * Serialize error object for logging
 * Converts Error objects to plain objects, stringifies non-objects
 */
export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause) {
      serialized.cause = serializeError(error.cause);
    }
    return serialized;
  }
  if (typeof error === 'object' && error !== null) {
    return error;
  }
  return String(error);
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

// Shared by a root logger and all of its children, so that
// `configureLogging` reaches loggers created at module load time.
interface LoggerSettings {
  minLevel: LogLevel;
  logDir?: string;
  sinks: Set<LogSink>;
}

class Logger {
  private name: string;
  private settings: LoggerSettings;

  constructor(
    name: string = 'statuscast',
    settings: LoggerSettings = { minLevel: LogLevel.INFO, sinks: new Set() }
  ) {
    this.name = name;
    this.settings = settings;
  }

  /**
   * Format timestamp
   */
  private formatLocalDate(date: Date): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
  }

  private getTimestamp(): string {
    const now = new Date();
    const hours = String(now.getHours()).padStart(2, '0');
    const minutes = String(now.getMinutes()).padStart(2, '0');
    const seconds = String(now.getSeconds()).padStart(2, '0');
    const ms = String(now.getMilliseconds()).padStart(3, '0');
    return `${hours}:${minutes}:${seconds}.${ms}`;
  }

  /**
   * Format log message
   */
  private format(
    level: string,
    levelColor: string,
    message: string,
    context?: LogContext,
    meta?: unknown
  ): string {
    const timestamp = colors.gray + this.getTimestamp() + colors.reset;
    const nameStr = `${colors.cyan}[${this.name}]${colors.reset}`;
    const levelStr = `${levelColor}[${level}]${colors.reset}`;
    const contextStr = context?.subscription
      ? ` ${colors.gray}(${context.subscription}${context.target ? ` -> ${context.target}` : ''})${colors.reset}`
      : '';

    let output = `${timestamp} ${nameStr} ${levelStr}${contextStr} ${message}`;

    if (meta !== undefined) {
      const metaStr =
        typeof meta === 'object'
          ? `\n${JSON.stringify(meta, null, 2)}`
          : String(meta);
      output += colors.gray + metaStr + colors.reset;
    }

    return output;
  }

  /**
   * Write log entry to file in JSON Lines format
   */
  private writeToFile(
    level: string,
    message: string,
    context?: LogContext,
    meta?: unknown
  ): void {
    const { logDir } = this.settings;
    if (!logDir) return;
    try {
      const logEntry = {
        time: new Date().toISOString(),
        level: level.toLowerCase(),
        subsystem: this.name,
        ...(context?.subscription ? { subscription: context.subscription } : {}),
        ...(context?.target ? { target: context.target } : {}),
        message,
        ...(meta !== undefined && { meta }),
      };
      const file = path.join(
        logDir,
        `statuscast-${this.formatLocalDate(new Date())}.json`
      );
      fs.appendFileSync(file, `${JSON.stringify(logEntry)}\n`, {
        encoding: 'utf8',
      });
    } catch (error) {
      console.error(`Failed to write log file: ${String(error)}`);
    }
  }

  private emit(
    level: LogLevel,
    color: string,
    message: string,
    context?: LogContext,
    meta?: Record<string, unknown>
  ): void {
    if (this.settings.minLevel > level) {
      return;
    }
    const levelName = LEVEL_NAMES[level];
    this.writeToFile(levelName, message, context, meta);
    const line = this.format(levelName, color, message, context, meta);
    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }

    for (const sink of this.settings.sinks) {
      sink({
        time: new Date(),
        level,
        subsystem: this.name,
        message,
        context,
        meta,
      });
    }
  }

  /**
   * Debug level log
   * @param meta - Optional metadata. Use StructuredLogMetadata for important logs with eventType
   */
  debug(
    message: string,
    context?: LogContext,
    meta?: Record<string, unknown>
  ): void {
    this.emit(LogLevel.DEBUG, colors.gray, message, context, meta);
  }

  /**
   * Info level log
   */
  info(
    message: string,
    context?: LogContext,
    meta?: Record<string, unknown>
  ): void {
    this.emit(LogLevel.INFO, colors.blue, message, context, meta);
  }

  /**
   * Warn level log
   */
  warn(
    message: string,
    context?: LogContext,
    meta?: Record<string, unknown>
  ): void {
    this.emit(LogLevel.WARN, colors.yellow, message, context, meta);
  }

  /**
   * Error level log
   */
  error(
    message: string,
    context?: LogContext,
    meta?: Record<string, unknown>
  ): void {
    this.emit(LogLevel.ERROR, colors.red, message, context, meta);
  }

  /**
   * Success log (info level, green)
   */
  success(
    message: string,
    context?: LogContext,
    meta?: Record<string, unknown>
  ): void {
    this.emit(LogLevel.INFO, colors.green, message, context, meta);
  }

  /**
   * Create a child logger with a different name
   */
  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, this.settings);
  }

  /**
   * Set minimum log level
   */
  setLevel(level: LogLevel): void {
    this.settings.minLevel = level;
  }

  /**
   * Enable JSON Lines files, one per day, under `logDir`
   */
  setLogDir(logDir: string | undefined): void {
    if (logDir) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    this.settings.logDir = logDir;
  }

  /**
   * Register a sink receiving every record that passes the level filter.
   * Returns a function removing it.
   */
  addSink(sink: LogSink): () => void {
    this.settings.sinks.add(sink);
    return () => {
      this.settings.sinks.delete(sink);
    };
  }
}

// Default logger instance
export const logger = new Logger('statuscast');

// Export Logger class, LogLevel, and LogContext for custom instances
export { Logger, LogLevel };
export type { LogContext };

// Export a factory function
export function getLogger(name: string): Logger {
  return logger.child(name);
}

export interface LoggingOptions {
  verbose?: boolean;
  logDir?: string;
}

/**
 * Apply process-wide logging options (shared by every child logger)
 */
export function configureLogging(options: LoggingOptions): void {
  logger.setLevel(options.verbose ? LogLevel.DEBUG : LogLevel.INFO);
  logger.setLogDir(options.logDir);
}
