/**
 * Cancoes service - HTTP application
 *
 * - GET /health - liveness probe
 * - /cancoes CRUD plus tag/ramo links under /cancoes/:id
 */

import express from 'express';
import { AuditLogger, createApp } from '@geav/shared';
import { CancaoHandler } from './handlers/CancaoHandler';
import { CancaoRepository } from './repositories/CancaoRepository';
import { cancaoRoutes } from './routes';

export interface ServerDeps {
  serviceName: string;
  cancoes: CancaoRepository;
  audit: AuditLogger;
}

export function createServer(deps: ServerDeps): express.Application {
  const handler = new CancaoHandler(deps.cancoes, deps.audit);

  return createApp({
    serviceName: deps.serviceName,
    audit: deps.audit,
    routes: cancaoRoutes(handler),
  });
}
