/**
 * Structured JSON Logger
 *
 * Operational console logging and the fallback channel of the audit sinks.
 * One JSON object per line; ERROR and FATAL go to stderr.
 */

import { ConsoleLogLine, LogLevel } from '../types/logging.types';

export class Logger {
  constructor(private component: string) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('DEBUG', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('INFO', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('WARN', message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('ERROR', message, metadata, error);
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('FATAL', message, metadata, error);
  }

  private log(
    severity: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    const requestId = metadata?.requestId;
    const userId = metadata?.userId;

    const entry: ConsoleLogLine = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      ...(typeof requestId === 'string' && requestId !== '' && { requestId }),
      ...(typeof userId === 'number' && userId !== 0 && { userId }),
      ...(metadata && { metadata }),
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
        },
      }),
    };

    const line = stringifyLine(entry);
    if (severity === 'ERROR' || severity === 'FATAL') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

// bigint metadata would make JSON.stringify throw
function stringifyLine(entry: ConsoleLogLine): string {
  return JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
