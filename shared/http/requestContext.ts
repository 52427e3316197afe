/**
 * Request context middleware
 *
 * The request id comes from the x-request-id header; the caller's user id
 * from the x-user-id principal claim the upstream gateway injects.
 */

import { NextFunction, Request, Response } from 'express';
import { RequestContext } from '../types/logging.types';
import { toRequestContext } from '../audit/context';

export const REQUEST_ID_HEADER = 'x-request-id';
export const USER_ID_HEADER = 'x-user-id';

/**
 * Strict integer parse of a path parameter
 */
export function parseId(raw: string | undefined): number | null {
  if (raw === undefined || !/^-?\d+$/.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

function parseUserId(raw: string | undefined): number | undefined {
  const value = parseId(raw?.trim());
  return value !== null && value > 0 ? value : undefined;
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  // req.get matches header names case-insensitively
  const requestId = req.get(REQUEST_ID_HEADER);
  const userId = parseUserId(req.get(USER_ID_HEADER));

  const context: RequestContext = {
    ...(requestId && { requestId }),
    ...(userId !== undefined && { userId }),
  };
  res.locals.requestContext = context;
  next();
}

export function requestContextOf(res: Response): RequestContext {
  return toRequestContext(res.locals.requestContext);
}
