/**
 * Structured logger with JSON output and correlation IDs
 */

import { randomUUID } from 'node:crypto';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  stream?: string;
  operation?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  correlationId: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export type LogOutput = (entry: LogEntry) => void;

// stdout carries the record stream, so log lines go to stderr
const writeToStderr: LogOutput = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export class Logger {
  private static instance: Logger | undefined;
  private readonly correlationId: string;
  private readonly context: LogContext;
  private logLevel: LogLevel;
  private readonly outputStream: LogOutput;

  constructor(logLevel: LogLevel = LogLevel.INFO, context: LogContext = {}, outputStream?: LogOutput) {
    this.logLevel = logLevel;
    this.correlationId = context.correlationId || randomUUID();
    this.context = { ...context, correlationId: this.correlationId };
    this.outputStream = outputStream || writeToStderr;
  }

  /**
   * Get singleton instance
   */
  static getInstance(logLevel?: LogLevel, context?: LogContext): Logger {
    if (!Logger.instance) {
      const level = logLevel ?? Logger.parseLogLevel(process.env.LOG_LEVEL);
      Logger.instance = new Logger(level, context);
    }
    return Logger.instance;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(
      this.logLevel,
      {
        ...this.context,
        ...context,
        correlationId: context.correlationId || this.correlationId
      },
      this.outputStream
    );
  }

  static parseLogLevel(level?: string): LogLevel {
    switch (level?.toLowerCase()) {
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
        return LogLevel.WARN;
      case 'info':
        return LogLevel.INFO;
      case 'debug':
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  private formatEntry(
    level: string,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      correlationId: this.correlationId,
      context: this.context
    };

    if (metadata) {
      entry.metadata = metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    return entry;
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.outputStream(this.formatEntry('ERROR', message, metadata, error));
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.outputStream(this.formatEntry('WARN', message, metadata));
    }
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.outputStream(this.formatEntry('INFO', message, metadata));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.outputStream(this.formatEntry('DEBUG', message, metadata));
    }
  }

  /**
   * Log an API call with its outcome
   */
  logApiCall(method: string, url: string, duration: number, status?: number, error?: Error): void {
    const metadata = {
      method,
      url,
      duration,
      status,
      success: !error && status !== undefined && status < 400
    };

    if (error) {
      this.error('API call failed', error, metadata);
    } else if (status !== undefined && status >= 400) {
      this.warn('API call returned error status', metadata);
    } else {
      this.debug('API call completed', metadata);
    }
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }
}

export function createLogger(context?: LogContext): Logger {
  return Logger.getInstance(undefined, context);
}

/**
 * Logger that drops every entry, for callers that opt out of logging
 */
export function createSilentLogger(): Logger {
  return new Logger(LogLevel.ERROR, { service: 'silent' }, () => undefined);
}
