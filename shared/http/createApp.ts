/**
 * Express application factory shared by every service
 *
 * Middleware order:
 * - request context (x-request-id, x-user-id)
 * - JSON body parsing
 * - request logging
 * - GET /health and the service's route table
 * - 404 and error handlers
 */

import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import { AuditLogger } from '../audit/AuditLogger';
import { toError } from '../errors/AppError';
import { HealthResponseBody } from '../types/api.types';
import { createLogger, Logger } from '../utils/logger';
import { requestContextMiddleware, requestContextOf } from './requestContext';
import { sendError, sendJSON } from './responses';

export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

export type RouteHandler = (req: Request, res: Response) => Promise<void>;

export interface RouteDefinition {
  method: HttpMethod;
  path: string;
  handler: RouteHandler;
}

export interface AppOptions {
  serviceName: string;
  audit: AuditLogger;
  routes: RouteDefinition[];
  logger?: Logger;
}

function wrap(handler: RouteHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function register(app: express.Application, route: RouteDefinition): void {
  const handler = wrap(route.handler);
  switch (route.method) {
    case 'get':
      app.get(route.path, handler);
      break;
    case 'post':
      app.post(route.path, handler);
      break;
    case 'put':
      app.put(route.path, handler);
      break;
    case 'delete':
      app.delete(route.path, handler);
      break;
  }
}

// body-parser tags malformed JSON with this type
function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && Reflect.get(error, 'type') === 'entity.parse.failed'
  );
}

async function respondToError(
  error: unknown,
  req: Request,
  res: Response,
  audit: AuditLogger
): Promise<void> {
  const ctx = requestContextOf(res);
  const extra = { method: req.method, path: req.path };

  if (isBodyParseError(error)) {
    await audit.warn(ctx, 'Invalid request body', { extra });
    sendError(res, 400, 'Invalid request body');
    return;
  }

  await audit.error(ctx, 'Unhandled error', toError(error), { extra });
  sendError(res, 500, 'Internal Server Error');
}

export function createApp(options: AppOptions): express.Application {
  const { serviceName, audit, routes } = options;
  const logger = options.logger ?? createLogger(serviceName);
  const app = express();

  app.use(requestContextMiddleware);
  app.use(express.json());

  // Request logging middleware
  app.use((req, res, next) => {
    const { requestId, userId } = requestContextOf(res);
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ...(requestId && { requestId }),
      ...(userId && { userId }),
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    const body: HealthResponseBody = {
      status: 'healthy',
      service: serviceName,
      timestamp: new Date().toISOString(),
    };
    sendJSON(res, 200, body);
  });

  routes.forEach((route) => register(app, route));

  // 404 handler for undefined routes
  app.use((req: Request, res: Response) => {
    logger.warn('Route not found', { method: req.method, path: req.path });
    sendError(res, 404, 'Not Found');
  });

  // Global error handler
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    respondToError(error, req, res, audit).catch(next);
  });

  return app;
}
