import { RouteDefinition } from '@geav/shared';
import { LugarHandler } from './handlers/LugarHandler';

export function lugarRoutes(handler: LugarHandler): RouteDefinition[] {
  return [
    { method: 'get', path: '/lugares', handler: (req, res) => handler.listLugares(req, res) },
    { method: 'get', path: '/lugares/:id', handler: (req, res) => handler.getLugar(req, res) },
    { method: 'post', path: '/lugares', handler: (req, res) => handler.createLugar(req, res) },
    { method: 'put', path: '/lugares/:id', handler: (req, res) => handler.updateLugar(req, res) },
    { method: 'delete', path: '/lugares/:id', handler: (req, res) => handler.deleteLugar(req, res) },

    // Images
    { method: 'post', path: '/lugares/:id/images', handler: (req, res) => handler.addImage(req, res) },
    {
      method: 'delete',
      path: '/lugares/:id/images/:imageId',
      handler: (req, res) => handler.deleteImage(req, res),
    },

    // Tag and ramo links
    { method: 'post', path: '/lugares/:id/tags', handler: (req, res) => handler.addTag(req, res) },
    { method: 'delete', path: '/lugares/:id/tags/:tagId', handler: (req, res) => handler.removeTag(req, res) },
    { method: 'post', path: '/lugares/:id/ramos', handler: (req, res) => handler.addRamo(req, res) },
    { method: 'delete', path: '/lugares/:id/ramos/:ramoId', handler: (req, res) => handler.removeRamo(req, res) },

    // Ratings
    { method: 'get', path: '/lugares/:id/ratings', handler: (req, res) => handler.getRatings(req, res) },
    { method: 'post', path: '/lugares/:id/ratings', handler: (req, res) => handler.addRating(req, res) },
    {
      method: 'put',
      path: '/lugares/:id/ratings/:ratingId',
      handler: (req, res) => handler.updateRating(req, res),
    },
    {
      method: 'delete',
      path: '/lugares/:id/ratings/:ratingId',
      handler: (req, res) => handler.deleteRating(req, res),
    },
  ];
}
