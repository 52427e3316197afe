/**
 * Unit tests for PostgresUserRepository
 */

import { AppError, NotFoundError } from '@geav/shared';
import { PostgresUserRepository } from '../../src/repositories/UserRepository';
import { UserRow } from '../../src/models/User';

const createdAt = new Date('2024-03-01T10:00:00.000Z');

const aliceRow: UserRow = {
  id: 7,
  username: 'alice',
  password: 'test-secret',
  role: 'write',
  created_at: createdAt,
  updated_at: createdAt,
};

describe('PostgresUserRepository', () => {
  let db: { query: jest.Mock };
  let repository: PostgresUserRepository;

  beforeEach(() => {
    db = { query: jest.fn() };
    repository = new PostgresUserRepository(db);
  });

  describe('getById', () => {
    it('should decode the row into a User', async () => {
      db.query.mockResolvedValue({ rows: [aliceRow], rowCount: 1 });

      const user = await repository.getById(7);

      expect(user).toEqual({
        id: 7,
        username: 'alice',
        password: 'test-secret',
        role: 'write',
        createdAt,
        updatedAt: createdAt,
      });
      expect(db.query.mock.calls[0][0]).toContain('FROM users WHERE id = $1');
      expect(db.query.mock.calls[0][1]).toEqual([7]);
    });

    it('should return null when no row matches', async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 });

      await expect(repository.getById(99)).resolves.toBeNull();
    });

    it('should wrap driver errors', async () => {
      db.query.mockRejectedValue(new Error('connection refused'));

      const error = await repository.getById(7).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        code: 'DATABASE_ERROR',
        message: 'Error getting user by ID: connection refused',
      });
    });
  });

  describe('getByUsername', () => {
    it('should look the user up by username', async () => {
      db.query.mockResolvedValue({ rows: [aliceRow], rowCount: 1 });

      const user = await repository.getByUsername('alice');

      expect(user?.id).toBe(7);
      expect(db.query.mock.calls[0][0]).toContain('WHERE username = $1');
      expect(db.query.mock.calls[0][1]).toEqual(['alice']);
    });
  });

  describe('list', () => {
    it('should return users ordered by id', async () => {
      db.query.mockResolvedValue({ rows: [aliceRow, { ...aliceRow, id: 8, username: 'bob' }], rowCount: 2 });

      const users = await repository.list();

      expect(users.map((u) => u.username)).toEqual(['alice', 'bob']);
      expect(db.query.mock.calls[0][0]).toContain('ORDER BY id');
    });
  });

  describe('create', () => {
    it('should insert and return the new id', async () => {
      db.query.mockResolvedValue({ rows: [{ id: 11 }], rowCount: 1 });

      const id = await repository.create({
        username: 'carol',
        password: 'test-secret',
        role: 'read',
        createdAt,
        updatedAt: createdAt,
      });

      expect(id).toBe(11);
      expect(db.query.mock.calls[0][0]).toContain('RETURNING id');
      expect(db.query.mock.calls[0][1]).toEqual(['carol', 'test-secret', 'read', createdAt, createdAt]);
    });
  });

  describe('update', () => {
    it('should pass the id last', async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 1 });

      await repository.update({
        id: 7,
        username: 'alice',
        password: 'test-secret',
        role: 'read',
        createdAt,
        updatedAt: createdAt,
      });

      expect(db.query.mock.calls[0][1]).toEqual(['alice', 'test-secret', 'read', createdAt, 7]);
    });

    it('should throw NotFoundError when no row was updated', async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 });

      await expect(
        repository.update({ id: 99, username: 'x', password: 'y', role: 'read', createdAt, updatedAt: createdAt })
      ).rejects.toThrow(NotFoundError);
    });
  });

  describe('delete', () => {
    it('should delete by id', async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 1 });

      await repository.delete(7);

      expect(db.query).toHaveBeenCalledWith('DELETE FROM users WHERE id = $1', [7]);
    });

    it('should throw NotFoundError with the id when nothing was deleted', async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 });

      await expect(repository.delete(99)).rejects.toThrow('user with ID 99 not found');
    });
  });
});
