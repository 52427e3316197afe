/**
 * ResourceHandler - common steps of every resource operation
 *
 * Each step that ends the request audits first, then writes the response,
 * so the audit entry exists before the caller sees the answer.
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { AuditLogger } from '../audit/AuditLogger';
import { toError } from '../errors/AppError';
import { NotFoundError } from '../errors/NotFoundError';
import { UserInputError, UserInputErrorCodes } from '../errors/UserInputError';
import { AuditContext, Metadata } from '../types/logging.types';
import { parseId, requestContextOf } from './requestContext';
import { sendError, sendJSON, sendNoContent } from './responses';

export abstract class ResourceHandler {
  protected constructor(
    protected readonly audit: AuditLogger,
    protected readonly resource: string
  ) {}

  protected auditContext(action: string, resourceId?: number, extra?: Metadata): AuditContext {
    return {
      action,
      resource: this.resource,
      ...(resourceId !== undefined && { resourceId: String(resourceId) }),
      ...(extra && { extra }),
    };
  }

  protected withExtra(audit: AuditContext, extra: Metadata): AuditContext {
    return { ...audit, extra: { ...audit.extra, ...extra } };
  }

  /**
   * Integer path parameter, or null once a 400 has been sent
   */
  protected async pathId(
    req: Request,
    res: Response,
    param: string,
    label: string,
    audit: AuditContext
  ): Promise<number | null> {
    const raw = req.params[param];
    const id = parseId(raw);
    if (id !== null) {
      return id;
    }

    const message = `Invalid ${label} ID`;
    const error = new UserInputError(`${message}: ${JSON.stringify(raw ?? '')}`, UserInputErrorCodes.INVALID_ID, {
      param,
    });
    await this.audit.error(requestContextOf(res), message, error, audit);
    sendError(res, error.statusCode, message);
    return null;
  }

  /**
   * Parsed request body, or null once a 400 has been sent
   */
  protected async body<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    req: Request,
    res: Response,
    audit: AuditContext
  ): Promise<T | null> {
    const result = schema.safeParse(req.body);
    if (result.success) {
      return result.data;
    }

    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
    const error = new UserInputError(issues.join('; '), UserInputErrorCodes.INVALID_BODY, { issues });
    await this.audit.error(requestContextOf(res), 'Invalid request body', error, audit);
    sendError(res, error.statusCode, 'Invalid request body');
    return null;
  }

  /**
   * 400 for a payload that parsed but fails a presence or range check
   */
  protected async invalid(
    res: Response,
    message: string,
    audit: AuditContext,
    auditMessage: string = message
  ): Promise<void> {
    await this.audit.warn(requestContextOf(res), auditMessage, audit);
    sendError(res, 400, message);
  }

  protected async notFound(res: Response, message: string, audit: AuditContext): Promise<void> {
    await this.audit.warn(requestContextOf(res), message, audit);
    sendError(res, 404, message);
  }

  protected async failed(res: Response, message: string, error: unknown, audit: AuditContext): Promise<void> {
    await this.audit.error(requestContextOf(res), message, toError(error), audit);
    sendError(res, 500, message);
  }

  /**
   * NotFoundError from an update or delete maps to 404, anything else to 500
   */
  protected async failedOrNotFound(
    res: Response,
    error: unknown,
    failureMessage: string,
    notFoundMessage: string,
    audit: AuditContext
  ): Promise<void> {
    if (error instanceof NotFoundError) {
      await this.notFound(res, notFoundMessage, audit);
      return;
    }
    await this.failed(res, failureMessage, error, audit);
  }

  /**
   * Audit a failed step that does not end the request
   */
  protected async reportFailure(res: Response, message: string, error: unknown, audit: AuditContext): Promise<void> {
    await this.audit.error(requestContextOf(res), message, toError(error), audit);
  }

  protected async succeeded(
    res: Response,
    statusCode: number,
    message: string,
    body: unknown,
    audit: AuditContext
  ): Promise<void> {
    await this.audit.info(requestContextOf(res), message, audit);
    sendJSON(res, statusCode, body);
  }

  protected async succeededWithoutContent(res: Response, message: string, audit: AuditContext): Promise<void> {
    await this.audit.info(requestContextOf(res), message, audit);
    sendNoContent(res);
  }
}
