/**
 * Logging and audit types
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'];

export type MetadataValue = string | number | boolean | bigint | null;

export type Metadata = Record<string, MetadataValue>;

/**
 * Per-request caller context, filled in by the router
 */
export interface RequestContext {
  requestId?: string;
  userId?: number;
}

/**
 * What a handler passes along with an audit call.
 * `extra` carries free-form scalars; the other keys are promoted to top-level entry fields.
 */
export interface AuditContext {
  action?: string;
  resource?: string;
  resourceId?: string;
  extra?: Metadata;
}

export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly message: string;
  readonly serviceName: string;
  readonly requestId: string;
  readonly userId: number;
  readonly action: string;
  readonly resource: string;
  readonly resourceId: string;
  readonly metadata?: Readonly<Metadata>;
  readonly error?: Error;
}

/**
 * Wire form of a LogEntry (console lines). The error never appears here.
 */
export interface SerializedLogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service_name: string;
  request_id?: string;
  user_id?: number;
  action?: string;
  resource?: string;
  resource_id?: string;
  metadata?: Metadata;
}

/**
 * Operational console log line written by the fallback Logger
 */
export interface ConsoleLogLine {
  severity: LogLevel;
  message: string;
  timestamp: string;
  component: string;
  requestId?: string;
  userId?: number;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}
