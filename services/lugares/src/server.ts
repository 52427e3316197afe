/**
 * Lugares service - HTTP application
 *
 * - GET /health - liveness probe
 * - /lugares CRUD plus images, tag/ramo links and ratings under /lugares/:id
 */

import express from 'express';
import { AuditLogger, createApp } from '@geav/shared';
import { LugarHandler } from './handlers/LugarHandler';
import { LugarRepository } from './repositories/LugarRepository';
import { lugarRoutes } from './routes';

export interface ServerDeps {
  serviceName: string;
  lugares: LugarRepository;
  audit: AuditLogger;
}

export function createServer(deps: ServerDeps): express.Application {
  const handler = new LugarHandler(deps.lugares, deps.audit);

  return createApp({
    serviceName: deps.serviceName,
    audit: deps.audit,
    routes: lugarRoutes(handler),
  });
}
