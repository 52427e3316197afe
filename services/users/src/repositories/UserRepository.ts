/**
 * UserRepository - users table access
 */

import { NotFoundError, Queryable, databaseError } from '@geav/shared';
import { NewUser, User, UserRow, toUser } from '../models/User';

const USER_COLUMNS = 'id, username, password, role, created_at, updated_at';

export interface UserRepository {
  getById(id: number): Promise<User | null>;
  getByUsername(username: string): Promise<User | null>;
  list(): Promise<User[]>;
  create(user: NewUser): Promise<number>;
  update(user: User): Promise<void>;
  delete(id: number): Promise<void>;
}

export class PostgresUserRepository implements UserRepository {
  constructor(private readonly db: Queryable) {}

  async getById(id: number): Promise<User | null> {
    try {
      const result = await this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
      const row = result.rows[0];
      return row ? toUser(row) : null;
    } catch (error) {
      throw databaseError('getting user by ID', error);
    }
  }

  async getByUsername(username: string): Promise<User | null> {
    try {
      const result = await this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, [
        username,
      ]);
      const row = result.rows[0];
      return row ? toUser(row) : null;
    } catch (error) {
      throw databaseError('getting user by username', error);
    }
  }

  async list(): Promise<User[]> {
    try {
      const result = await this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY id`);
      return result.rows.map(toUser);
    } catch (error) {
      throw databaseError('listing users', error);
    }
  }

  async create(user: NewUser): Promise<number> {
    try {
      const result = await this.db.query<{ id: number }>(
        `INSERT INTO users (username, password, role, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id`,
        [user.username, user.password, user.role, user.createdAt, user.updatedAt]
      );
      return result.rows[0].id;
    } catch (error) {
      throw databaseError('creating user', error);
    }
  }

  async update(user: User): Promise<void> {
    let rowCount: number | null;
    try {
      const result = await this.db.query(
        `UPDATE users
         SET username = $1, password = $2, role = $3, updated_at = $4
         WHERE id = $5`,
        [user.username, user.password, user.role, user.updatedAt, user.id]
      );
      rowCount = result.rowCount;
    } catch (error) {
      throw databaseError('updating user', error);
    }

    if (!rowCount) {
      throw new NotFoundError('user', user.id);
    }
  }

  async delete(id: number): Promise<void> {
    let rowCount: number | null;
    try {
      const result = await this.db.query('DELETE FROM users WHERE id = $1', [id]);
      rowCount = result.rowCount;
    } catch (error) {
      throw databaseError('deleting user', error);
    }

    if (!rowCount) {
      throw new NotFoundError('user', id);
    }
  }
}
