/**
 * Request context extraction
 *
 * Contexts reach the audit logger through untyped channels (res.locals),
 * so anything missing or of the wrong type reads as absent.
 */

import { RequestContext } from '../types/logging.types';

function readField(ctx: unknown, key: keyof RequestContext): unknown {
  if (typeof ctx !== 'object' || ctx === null) {
    return undefined;
  }
  return Reflect.get(ctx, key);
}

/**
 * Request id carried by the context, '' when absent
 */
export function getRequestIdFromContext(ctx: unknown): string {
  const requestId = readField(ctx, 'requestId');
  return typeof requestId === 'string' ? requestId : '';
}

/**
 * Caller user id carried by the context, 0 when absent
 */
export function getUserIdFromContext(ctx: unknown): number {
  const userId = readField(ctx, 'userId');
  return typeof userId === 'number' && Number.isInteger(userId) ? userId : 0;
}

/**
 * Normalize an untyped context into a RequestContext
 */
export function toRequestContext(ctx: unknown): RequestContext {
  const requestId = getRequestIdFromContext(ctx);
  const userId = getUserIdFromContext(ctx);
  return {
    ...(requestId !== '' && { requestId }),
    ...(userId !== 0 && { userId }),
  };
}
