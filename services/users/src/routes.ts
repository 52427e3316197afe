import { RouteDefinition } from '@geav/shared';
import { UserHandler } from './handlers/UserHandler';

export function userRoutes(handler: UserHandler): RouteDefinition[] {
  return [
    { method: 'get', path: '/users', handler: (req, res) => handler.listUsers(req, res) },
    { method: 'get', path: '/users/:id', handler: (req, res) => handler.getUser(req, res) },
    { method: 'post', path: '/users', handler: (req, res) => handler.createUser(req, res) },
    { method: 'put', path: '/users/:id', handler: (req, res) => handler.updateUser(req, res) },
    { method: 'delete', path: '/users/:id', handler: (req, res) => handler.deleteUser(req, res) },
  ];
}
