// Utility: Structured logger
// Provides a consistent JSON log format for service and infrastructure events

export interface LogContext {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Simple structured logger, one instance per component
 */
export class Logger {
  private prefix: string;

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    // Keep test output readable
    if (process.env.NODE_ENV === 'test') return;

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.prefix,
      message,
      ...context,
    };

    const formatted = JSON.stringify(logEntry);
    if (level === 'error') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
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

  debug(message: string, context?: LogContext): void {
    if (process.env.NODE_ENV !== 'production') {
      this.log('debug', message, context);
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const appLogger = new Logger('App');
export const authLogger = new Logger('Auth');
export const lendingLogger = new Logger('Lending');
export const mailLogger = new Logger('Mail');
export const storageLogger = new Logger('Storage');
export const cleanupLogger = new Logger('TokenCleanup');
