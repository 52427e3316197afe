/**
 * CancaoRepository - cancoes and their tag/ramo links
 */

import {
  NamedEntity,
  NamedEntityRow,
  NotFoundError,
  Queryable,
  databaseError,
  toNamedEntity,
} from '@geav/shared';
import { Cancao, CancaoRow, NewCancao, toCancao } from '../models/Cancao';

const CANCAO_COLUMNS = 'id, nome, link_youtube, letra, user_id, created_at, updated_at';

export interface CancaoRepository {
  getById(id: number): Promise<Cancao | null>;
  list(): Promise<Cancao[]>;
  create(cancao: NewCancao): Promise<number>;
  update(id: number, cancao: NewCancao): Promise<void>;
  delete(id: number): Promise<void>;

  addTag(cancaoId: number, tagId: number): Promise<void>;
  removeTag(cancaoId: number, tagId: number): Promise<void>;
  getTags(cancaoId: number): Promise<NamedEntity[]>;

  addRamo(cancaoId: number, ramoId: number): Promise<void>;
  removeRamo(cancaoId: number, ramoId: number): Promise<void>;
  getRamos(cancaoId: number): Promise<NamedEntity[]>;
}

export class PostgresCancaoRepository implements CancaoRepository {
  constructor(private readonly db: Queryable) {}

  async getById(id: number): Promise<Cancao | null> {
    let row: CancaoRow | undefined;
    try {
      const result = await this.db.query<CancaoRow>(`SELECT ${CANCAO_COLUMNS} FROM cancoes WHERE id = $1`, [id]);
      row = result.rows[0];
    } catch (error) {
      throw databaseError('getting cancao by ID', error);
    }

    if (!row) {
      return null;
    }
    return this.withRelations(toCancao(row));
  }

  async list(): Promise<Cancao[]> {
    let rows: CancaoRow[];
    try {
      const result = await this.db.query<CancaoRow>(`SELECT ${CANCAO_COLUMNS} FROM cancoes ORDER BY id`);
      rows = result.rows;
    } catch (error) {
      throw databaseError('listing cancoes', error);
    }

    const cancoes: Cancao[] = [];
    for (const row of rows) {
      cancoes.push(await this.withRelations(toCancao(row)));
    }
    return cancoes;
  }

  async create(cancao: NewCancao): Promise<number> {
    try {
      const result = await this.db.query<{ id: number }>(
        `INSERT INTO cancoes (nome, link_youtube, letra, user_id, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING id`,
        [cancao.nome, cancao.linkYoutube, cancao.letra, cancao.userId, cancao.createdAt, cancao.updatedAt]
      );
      return result.rows[0].id;
    } catch (error) {
      throw databaseError('creating cancao', error);
    }
  }

  async update(id: number, cancao: NewCancao): Promise<void> {
    let rowCount: number | null;
    try {
      const result = await this.db.query(
        `UPDATE cancoes
         SET nome = $1, link_youtube = $2, letra = $3, user_id = $4, updated_at = $5
         WHERE id = $6`,
        [cancao.nome, cancao.linkYoutube, cancao.letra, cancao.userId, cancao.updatedAt, id]
      );
      rowCount = result.rowCount;
    } catch (error) {
      throw databaseError('updating cancao', error);
    }

    if (!rowCount) {
      throw new NotFoundError('cancao', id);
    }
  }

  async delete(id: number): Promise<void> {
    let rowCount: number | null;
    try {
      const result = await this.db.query('DELETE FROM cancoes WHERE id = $1', [id]);
      rowCount = result.rowCount;
    } catch (error) {
      throw databaseError('deleting cancao', error);
    }

    if (!rowCount) {
      throw new NotFoundError('cancao', id);
    }
  }

  async addTag(cancaoId: number, tagId: number): Promise<void> {
    await this.execute(
      `INSERT INTO cancoes_tags (cancao_id, tag_id)
       VALUES ($1, $2)
       ON CONFLICT (cancao_id, tag_id) DO NOTHING`,
      [cancaoId, tagId],
      'adding tag to cancao'
    );
  }

  async removeTag(cancaoId: number, tagId: number): Promise<void> {
    await this.execute(
      'DELETE FROM cancoes_tags WHERE cancao_id = $1 AND tag_id = $2',
      [cancaoId, tagId],
      'removing tag from cancao'
    );
  }

  async getTags(cancaoId: number): Promise<NamedEntity[]> {
    return this.linked(
      `SELECT t.id, t.name, t.created_at
       FROM tags_cancoes t
       JOIN cancoes_tags ct ON t.id = ct.tag_id
       WHERE ct.cancao_id = $1
       ORDER BY t.name`,
      cancaoId,
      'getting tags for cancao'
    );
  }

  async addRamo(cancaoId: number, ramoId: number): Promise<void> {
    await this.execute(
      `INSERT INTO cancoes_ramos (cancao_id, ramo_id)
       VALUES ($1, $2)
       ON CONFLICT (cancao_id, ramo_id) DO NOTHING`,
      [cancaoId, ramoId],
      'adding ramo to cancao'
    );
  }

  async removeRamo(cancaoId: number, ramoId: number): Promise<void> {
    await this.execute(
      'DELETE FROM cancoes_ramos WHERE cancao_id = $1 AND ramo_id = $2',
      [cancaoId, ramoId],
      'removing ramo from cancao'
    );
  }

  async getRamos(cancaoId: number): Promise<NamedEntity[]> {
    return this.linked(
      `SELECT r.id, r.name, r.created_at
       FROM ramos r
       JOIN cancoes_ramos cr ON r.id = cr.ramo_id
       WHERE cr.cancao_id = $1
       ORDER BY r.name`,
      cancaoId,
      'getting ramos for cancao'
    );
  }

  private async withRelations(cancao: Cancao): Promise<Cancao> {
    return {
      ...cancao,
      tags: await this.getTags(cancao.id),
      ramos: await this.getRamos(cancao.id),
    };
  }

  private async linked(sql: string, cancaoId: number, operation: string): Promise<NamedEntity[]> {
    try {
      const result = await this.db.query<NamedEntityRow>(sql, [cancaoId]);
      return result.rows.map(toNamedEntity);
    } catch (error) {
      throw databaseError(operation, error);
    }
  }

  private async execute(sql: string, params: unknown[], operation: string): Promise<void> {
    try {
      await this.db.query(sql, params);
    } catch (error) {
      throw databaseError(operation, error);
    }
  }
}
