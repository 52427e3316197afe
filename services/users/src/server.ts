/**
 * Users service - HTTP application
 *
 * - GET /health - liveness probe
 * - GET|POST /users, GET|PUT|DELETE /users/:id
 */

import express from 'express';
import { AuditLogger, createApp } from '@geav/shared';
import { UserHandler } from './handlers/UserHandler';
import { UserRepository } from './repositories/UserRepository';
import { userRoutes } from './routes';

export interface ServerDeps {
  serviceName: string;
  users: UserRepository;
  audit: AuditLogger;
}

export function createServer(deps: ServerDeps): express.Application {
  const handler = new UserHandler(deps.users, deps.audit);

  return createApp({
    serviceName: deps.serviceName,
    audit: deps.audit,
    routes: userRoutes(handler),
  });
}
