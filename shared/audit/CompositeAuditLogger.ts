/**
 * CompositeAuditLogger - fans every call out to each held logger, in order
 */

import { AuditContext, RequestContext } from '../types/logging.types';
import { toError } from '../errors/AppError';
import { createLogger, Logger } from '../utils/logger';
import { AuditLogger } from './AuditLogger';

export class CompositeAuditLogger implements AuditLogger {
  private readonly loggers: readonly AuditLogger[];
  private readonly fallback: Logger;

  constructor(loggers: AuditLogger[], fallback: Logger = createLogger('CompositeAuditLogger')) {
    this.loggers = [...loggers];
    this.fallback = fallback;
  }

  get size(): number {
    return this.loggers.length;
  }

  debug(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void> {
    return this.forEach('debug', (logger) => logger.debug(ctx, message, audit));
  }

  info(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void> {
    return this.forEach('info', (logger) => logger.info(ctx, message, audit));
  }

  warn(ctx: RequestContext | undefined, message: string, audit?: AuditContext): Promise<void> {
    return this.forEach('warn', (logger) => logger.warn(ctx, message, audit));
  }

  error(
    ctx: RequestContext | undefined,
    message: string,
    error: Error | null | undefined,
    audit?: AuditContext
  ): Promise<void> {
    return this.forEach('error', (logger) => logger.error(ctx, message, error, audit));
  }

  fatal(
    ctx: RequestContext | undefined,
    message: string,
    error: Error | null | undefined,
    audit?: AuditContext
  ): Promise<void> {
    return this.forEach('fatal', (logger) => logger.fatal(ctx, message, error, audit));
  }

  private async forEach(
    method: keyof AuditLogger,
    call: (logger: AuditLogger) => Promise<void>
  ): Promise<void> {
    for (const [index, logger] of this.loggers.entries()) {
      try {
        await call(logger);
      } catch (error) {
        // Sinks swallow their own failures; this only catches a misbehaving one
        this.fallback.error('Audit logger rejected', toError(error), { method, index });
      }
    }
  }
}
