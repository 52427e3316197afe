import { RouteDefinition } from '@geav/shared';
import { CancaoHandler } from './handlers/CancaoHandler';

export function cancaoRoutes(handler: CancaoHandler): RouteDefinition[] {
  return [
    { method: 'get', path: '/cancoes', handler: (req, res) => handler.listCancoes(req, res) },
    { method: 'get', path: '/cancoes/:id', handler: (req, res) => handler.getCancao(req, res) },
    { method: 'post', path: '/cancoes', handler: (req, res) => handler.createCancao(req, res) },
    { method: 'put', path: '/cancoes/:id', handler: (req, res) => handler.updateCancao(req, res) },
    { method: 'delete', path: '/cancoes/:id', handler: (req, res) => handler.deleteCancao(req, res) },

    // Tag and ramo links
    { method: 'post', path: '/cancoes/:id/tags', handler: (req, res) => handler.addTag(req, res) },
    { method: 'delete', path: '/cancoes/:id/tags/:tagId', handler: (req, res) => handler.removeTag(req, res) },
    { method: 'post', path: '/cancoes/:id/ramos', handler: (req, res) => handler.addRamo(req, res) },
    { method: 'delete', path: '/cancoes/:id/ramos/:ramoId', handler: (req, res) => handler.removeRamo(req, res) },
  ];
}
