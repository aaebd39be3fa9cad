/**
 * Logging utility for pipeline progress and debugging
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogContext {
  stage?: string;
  performer?: string;
  rowNumber?: number;
  durationMs?: number;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export class Logger {
  private readonly baseContext: LogContext;

  constructor(baseContext: LogContext = {}) {
    this.baseContext = baseContext;
  }

  private get isProduction(): boolean {
    return process.env.NODE_ENV === 'production';
  }

  private get minLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL?.toLowerCase();
    return isLogLevel(configured) ? configured : 'info';
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const merged = { ...this.baseContext, ...context };
    const hasContext = Object.keys(merged).length > 0;

    // Structured logging format for production
    if (this.isProduction) {
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...merged,
      });
    }

    // Human-readable format for development
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
    const contextStr = hasContext ? ` ${JSON.stringify(merged)}` : '';
    return `${prefix} ${message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const formattedMessage = this.formatMessage(level, message, context);

    switch (level) {
      case 'debug':
        console.debug(formattedMessage);
        break;
      case 'info':
        console.log(formattedMessage);
        break;
      case 'warn':
        console.warn(formattedMessage);
        break;
      case 'error':
        console.error(formattedMessage);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  // Create a child logger with context
  child(context: LogContext): Logger {
    return new Logger({ ...this.baseContext, ...context });
  }
}

// Singleton instance
export const logger = new Logger();
