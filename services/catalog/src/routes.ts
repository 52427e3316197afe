import { RouteDefinition } from '@geav/shared';
import { NamedEntityHandler } from './handlers/NamedEntityHandler';

export function catalogRoutes(basePath: string, handler: NamedEntityHandler): RouteDefinition[] {
  return [
    { method: 'get', path: basePath, handler: (req, res) => handler.list(req, res) },
    { method: 'post', path: basePath, handler: (req, res) => handler.create(req, res) },
    { method: 'get', path: `${basePath}/:id`, handler: (req, res) => handler.get(req, res) },
    { method: 'put', path: `${basePath}/:id`, handler: (req, res) => handler.update(req, res) },
    { method: 'delete', path: `${basePath}/:id`, handler: (req, res) => handler.delete(req, res) },
  ];
}
