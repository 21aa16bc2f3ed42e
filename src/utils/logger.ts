/**
 * Logger for Build Shape Scaler
 *
 * Supports different log levels, timing operations and pluggable sinks
 * (console by default, optionally a log file).
 */

import * as fs from 'fs';

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Log level from its configuration name
 */
export function toLogLevel(name: 'debug' | 'info' | 'warn' | 'error'): LogLevel {
  switch (name) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
  }
}

/**
 * Receives every formatted log line
 */
export type LogSink = (level: LogLevel, line: string, context?: LoggerContext) => void;

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  colors?: boolean;
  prefix?: string;
  sinks?: LogSink[];
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  filePath?: string | undefined;
  scale?: string | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Write to the terminal, errors and warnings on stderr
 */
export const consoleSink: LogSink = (level, line, context) => {
  const write = level === LogLevel.ERROR || level === LogLevel.WARN ? console.error : console.log;
  if (context) {
    write(line, context);
  } else {
    write(line);
  }
};

/**
 * Append plain lines (no colours, context as JSON) to a log file
 */
export function createFileSink(filePath: string): LogSink {
  return (_level, line, context) => {
    const plain = line.replace(/\x1b\[[0-9;]*m/g, '');
    const suffix = context ? ` ${JSON.stringify(context)}` : '';
    fs.appendFileSync(filePath, `${plain}${suffix}\n`);
  };
}

/**
 * Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      colors: options.colors ?? true,
      prefix: options.prefix || 'Scaler',
      sinks: options.sinks ?? [consoleSink]
    };
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    if (!this.options.colors) return '';
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m'; // Gray for debug info
      case LogLevel.INFO:
        return '\x1b[36m'; // Cyan for operations
      case LogLevel.WARN:
        return '\x1b[33m'; // Yellow for warnings
      case LogLevel.ERROR:
        return '\x1b[31m'; // Red for errors
    }
  }

  private getResetColor(): string {
    return this.options.colors ? '\x1b[0m' : '';
  }

  /**
   * Check if should log based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const prefix = `${this.options.prefix} [${level.toUpperCase()}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';
    const line = `${this.getColor(level)}${prefix}${timeStr} ${message}${this.getResetColor()}`;

    for (const sink of this.options.sinks) {
      sink(level, line, context);
    }
  }

  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime !== undefined) {
      const duration = Date.now() - startTime;
      this.startTimes.delete(operation);
      this.info(`Completed operation: ${operation}`, {
        operation,
        duration,
        ...context
      });
    }
  }

  /**
   * Log operation with timing
   */
  async withTiming<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LoggerContext
  ): Promise<T> {
    this.startTiming(operation);
    try {
      const result = await fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  /**
   * Log file operation
   */
  logFileOperation(operation: string, filePath: string, context?: LoggerContext): void {
    this.debug(`File operation: ${operation}`, {
      operation,
      filePath,
      ...context
    });
  }

  /**
   * Log pipeline stage
   */
  logStage(stage: string, context?: LoggerContext): void {
    this.debug(`Stage: ${stage}`, {
      stage,
      ...context
    });
  }
}

/**
 * Options every factory logger starts from
 */
let defaults: LoggerOptions = {
  level: LogLevel.INFO,
  timestamp: true
};

/**
 * Change the options loggers created by the factory start from
 *
 * Front ends call this once, before any work starts.
 */
export function configureLogging(options: LoggerOptions): void {
  defaults = { ...defaults, ...options };
}

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger({ ...defaults, ...options });
}

/**
 * Logger factory for specific concerns
 */
export const LoggerFactory = {
  /**
   * Create logger for batch runs
   */
  forBatch(): Logger {
    return createLogger({ prefix: 'Scaler-Batch' });
  },

  /**
   * Create logger for template loading
   */
  forTemplates(): Logger {
    return createLogger({ prefix: 'Scaler-Templates' });
  },

  /**
   * Create logger that drops everything, for embedding and tests
   */
  silent(): Logger {
    return new Logger({ level: LogLevel.ERROR, sinks: [] });
  }
};
