/**
 * NamedEntityRepository - one instance per lookup table
 */

import { Queryable, databaseError } from '../database/Database';
import { NotFoundError } from '../errors/NotFoundError';
import { NamedEntity, NamedEntityRow, toNamedEntity } from '../models/NamedEntity';

export type NamedEntityTable = 'tags_lugares' | 'tags_cancoes' | 'ramos';

export interface NamedEntityStore {
  getById(id: number): Promise<NamedEntity | null>;
  list(): Promise<NamedEntity[]>;
  create(name: string): Promise<NamedEntity>;
  update(id: number, name: string): Promise<NamedEntity>;
  delete(id: number): Promise<void>;
}

export class NamedEntityRepository implements NamedEntityStore {
  constructor(
    private readonly db: Queryable,
    readonly table: NamedEntityTable,
    private readonly entity: string
  ) {}

  async getById(id: number): Promise<NamedEntity | null> {
    try {
      const result = await this.db.query<NamedEntityRow>(
        `SELECT id, name, created_at FROM ${this.table} WHERE id = $1`,
        [id]
      );
      const row = result.rows[0];
      return row ? toNamedEntity(row) : null;
    } catch (error) {
      throw databaseError(`getting ${this.entity} by ID`, error);
    }
  }

  async list(): Promise<NamedEntity[]> {
    try {
      const result = await this.db.query<NamedEntityRow>(
        `SELECT id, name, created_at FROM ${this.table} ORDER BY name`
      );
      return result.rows.map(toNamedEntity);
    } catch (error) {
      throw databaseError(`listing ${this.entity}`, error);
    }
  }

  async create(name: string): Promise<NamedEntity> {
    try {
      const result = await this.db.query<NamedEntityRow>(
        `INSERT INTO ${this.table} (name) VALUES ($1) RETURNING id, name, created_at`,
        [name]
      );
      return toNamedEntity(result.rows[0]);
    } catch (error) {
      throw databaseError(`creating ${this.entity}`, error);
    }
  }

  async update(id: number, name: string): Promise<NamedEntity> {
    let row: NamedEntityRow | undefined;
    try {
      const result = await this.db.query<NamedEntityRow>(
        `UPDATE ${this.table} SET name = $1 WHERE id = $2 RETURNING id, name, created_at`,
        [name, id]
      );
      row = result.rows[0];
    } catch (error) {
      throw databaseError(`updating ${this.entity}`, error);
    }

    if (!row) {
      throw new NotFoundError(this.entity, id);
    }
    return toNamedEntity(row);
  }

  async delete(id: number): Promise<void> {
    let rowCount: number | null;
    try {
      const result = await this.db.query(`DELETE FROM ${this.table} WHERE id = $1`, [id]);
      rowCount = result.rowCount;
    } catch (error) {
      throw databaseError(`deleting ${this.entity}`, error);
    }

    if (!rowCount) {
      throw new NotFoundError(this.entity, id);
    }
  }
}
