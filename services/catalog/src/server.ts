/**
 * Catalog service - HTTP application
 *
 * - GET /health - liveness probe
 * - /ramos, /tags/lugares and /tags/cancoes CRUD
 */

import express from 'express';
import { AuditLogger, NamedEntityStore, NamedEntityTable, createApp } from '@geav/shared';
import { CATALOGS } from './catalogs';
import { NamedEntityHandler } from './handlers/NamedEntityHandler';
import { catalogRoutes } from './routes';

export interface ServerDeps {
  serviceName: string;
  stores: Record<NamedEntityTable, NamedEntityStore>;
  audit: AuditLogger;
}

export function createServer(deps: ServerDeps): express.Application {
  const routes = CATALOGS.flatMap((catalog) =>
    catalogRoutes(catalog.basePath, new NamedEntityHandler(deps.stores[catalog.table], deps.audit, catalog))
  );

  return createApp({
    serviceName: deps.serviceName,
    audit: deps.audit,
    routes,
  });
}
