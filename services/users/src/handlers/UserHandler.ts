/**
 * UserHandler - /users endpoints
 */

import { Request, Response } from 'express';
import { AuditLogger, ResourceHandler } from '@geav/shared';
import { User, isValidRole, serializeUser } from '../models/User';
import { UserRepository } from '../repositories/UserRepository';
import { UserPayloadSchema } from '../schemas/userSchemas';

export class UserHandler extends ResourceHandler {
  constructor(
    private readonly users: UserRepository,
    audit: AuditLogger
  ) {
    super(audit, 'users');
  }

  async getUser(req: Request, res: Response): Promise<void> {
    const userId = await this.pathId(req, res, 'id', 'user', this.auditContext('GetUser'));
    if (userId === null) {
      return;
    }
    const audit = this.auditContext('GetUser', userId);

    let user: User | null;
    try {
      user = await this.users.getById(userId);
    } catch (error) {
      await this.failed(res, 'Error getting user', error, audit);
      return;
    }

    if (!user) {
      await this.notFound(res, 'User not found', audit);
      return;
    }

    await this.succeeded(res, 200, 'User retrieved successfully', serializeUser(user), audit);
  }

  async listUsers(_req: Request, res: Response): Promise<void> {
    let users: User[];
    try {
      users = await this.users.list();
    } catch (error) {
      await this.failed(res, 'Error listing users', error, this.auditContext('ListUsers'));
      return;
    }

    await this.succeeded(
      res,
      200,
      'Users listed successfully',
      users.map(serializeUser),
      this.auditContext('ListUsers', undefined, { count: users.length })
    );
  }

  async createUser(req: Request, res: Response): Promise<void> {
    const audit = this.auditContext('CreateUser');
    const payload = await this.body(UserPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    const { username, password, role } = payload;
    if (username === '' || password === '' || !isValidRole(role)) {
      await this.invalid(res, 'Invalid user data', audit);
      return;
    }

    const now = new Date();
    const user: User = { id: 0, username, password, role, createdAt: now, updatedAt: now };

    try {
      user.id = await this.users.create(user);
    } catch (error) {
      await this.failed(res, 'Error creating user', error, audit);
      return;
    }

    await this.succeeded(
      res,
      201,
      'User created successfully',
      serializeUser(user),
      this.auditContext('CreateUser', user.id)
    );
  }

  async updateUser(req: Request, res: Response): Promise<void> {
    const userId = await this.pathId(req, res, 'id', 'user', this.auditContext('UpdateUser'));
    if (userId === null) {
      return;
    }
    const audit = this.auditContext('UpdateUser', userId);

    let existing: User | null;
    try {
      existing = await this.users.getById(userId);
    } catch (error) {
      await this.failed(res, 'Error getting user', error, audit);
      return;
    }

    if (!existing) {
      await this.notFound(res, 'User not found', audit);
      return;
    }

    const payload = await this.body(UserPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    const { username, password, role } = payload;
    if (username === '' || password === '' || !isValidRole(role)) {
      await this.invalid(res, 'Invalid user data', audit);
      return;
    }

    const updated: User = { ...existing, username, password, role, updatedAt: new Date() };

    try {
      await this.users.update(updated);
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error updating user', 'User not found', audit);
      return;
    }

    await this.succeeded(res, 200, 'User updated successfully', serializeUser(updated), audit);
  }

  async deleteUser(req: Request, res: Response): Promise<void> {
    const userId = await this.pathId(req, res, 'id', 'user', this.auditContext('DeleteUser'));
    if (userId === null) {
      return;
    }
    const audit = this.auditContext('DeleteUser', userId);

    try {
      await this.users.delete(userId);
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error deleting user', 'User not found', audit);
      return;
    }

    await this.succeededWithoutContent(res, 'User deleted successfully', audit);
  }
}
