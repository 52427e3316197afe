/**
 * AuditLogger - capability contract every handler logs through
 *
 * Calls resolve once every sink has been attempted and never reject;
 * sink failures surface only on the sink's fallback console channel.
 */

import { AuditContext, LogEntry, LogLevel, RequestContext } from '../types/logging.types';
import { toError } from '../errors/AppError';
import { Logger } from '../utils/logger';
import { createLogEntry } from './logEntry';

export interface AuditLogger {
  debug(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void>;
  info(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void>;
  warn(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void>;
  error(
    ctx: RequestContext | undefined,
    message: string,
    error: Error | null | undefined,
    audit?: AuditContext
  ): Promise<void>;
  fatal(
    ctx: RequestContext | undefined,
    message: string,
    error: Error | null | undefined,
    audit?: AuditContext
  ): Promise<void>;
}

/**
 * Shared entry building for concrete sinks; subclasses only write.
 */
export abstract class BaseAuditLogger implements AuditLogger {
  protected constructor(
    protected readonly serviceName: string,
    protected readonly fallback: Logger
  ) {}

  debug(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void> {
    return this.dispatch('DEBUG', ctx, message, undefined, audit);
  }

  info(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void> {
    return this.dispatch('INFO', ctx, message, undefined, audit);
  }

  warn(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void> {
    return this.dispatch('WARN', ctx, message, undefined, audit);
  }

  error(
    ctx: RequestContext | undefined,
    message: string,
    error: Error | null | undefined,
    audit?: AuditContext
  ): Promise<void> {
    return this.dispatch('ERROR', ctx, message, error, audit);
  }

  fatal(
    ctx: RequestContext | undefined,
    message: string,
    error: Error | null | undefined,
    audit?: AuditContext
  ): Promise<void> {
    return this.dispatch('FATAL', ctx, message, error, audit);
  }

  /**
   * Persist one entry. Implementations report their own failures on the fallback channel.
   */
  protected abstract write(entry: LogEntry): Promise<void>;

  private async dispatch(
    level: LogLevel,
    ctx: RequestContext | undefined,
    message: string,
    error: Error | null | undefined,
    audit?: AuditContext
  ): Promise<void> {
    const entry = createLogEntry(this.serviceName, level, message, ctx, error, audit);
    try {
      await this.write(entry);
    } catch (writeError) {
      this.fallback.error('Unhandled audit sink failure', toError(writeError), { level, message });
    }
  }
}
