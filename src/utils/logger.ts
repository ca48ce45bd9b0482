/**
 * Logger utility for the application
 * Provides a consistent, structured logging interface across the pipeline.
 * Child loggers carry a scope (usually a source name) in the line prefix.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  data?: LogData;
  error?: unknown;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  private readonly logLevel: LogLevel;

  constructor(private readonly scope?: string, level?: LogLevel) {
    // Default to 'info' if LOG_LEVEL env var is not set or unknown
    const fromEnv = process.env.LOG_LEVEL;
    this.logLevel = level ?? (isLogLevel(fromEnv) ? fromEnv : 'info');
  }

  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope, this.logLevel);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: LogData): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      scope: this.scope,
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, scope, data, error } = logMessage;
    const prefix = scope
      ? `[${timestamp}] [${level.toUpperCase()}] [${scope}]`
      : `[${timestamp}] [${level.toUpperCase()}]`;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, data ?? '');
        break;
      case 'info':
        console.info(prefix, message, data ?? '');
        break;
      case 'warn':
        console.warn(prefix, message, data ?? '');
        break;
      case 'error':
        console.error(prefix, message, data ?? '', error ?? '');
        break;
    }
  }

  debug(message: string, data?: LogData) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: LogData) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: LogData) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: LogData) {
    if (this.shouldLog('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error;
      this.output(logMessage);
    }
  }
}

// Export singleton instance
export const logger = new Logger();
