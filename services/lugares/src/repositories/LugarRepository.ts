/**
 * LugarRepository - lugares and their images, tag/ramo links and ratings
 *
 * getById and list read average rating and count from the
 * lugares_with_ratings materialized view.
 */

import {
  NamedEntity,
  NamedEntityRow,
  NotFoundError,
  Queryable,
  databaseError,
  toNamedEntity,
} from '@geav/shared';
import {
  Lugar,
  LugarImage,
  LugarImageRow,
  LugarRating,
  LugarRatingRow,
  LugarRow,
  NewLugar,
  toLugar,
  toLugarImage,
  toLugarRating,
} from '../models/Lugar';

const LUGAR_SELECT = `
  SELECT l.id, l.nome_local, l.nome_dono_local, l.telefone_para_contato,
         l.link_google_maps, l.link_site, l.endereco_completo,
         l.local_publico, l.valor_fixo, l.valor_individual,
         l.user_id, l.created_at, l.updated_at,
         COALESCE(lwr.average_rating, 0) AS average_rating,
         COALESCE(lwr.rating_count, 0) AS rating_count
  FROM lugares l
  LEFT JOIN lugares_with_ratings lwr ON l.id = lwr.id
`;

const RATING_COLUMNS = 'id, lugar_id, user_id, rating, date';

export interface LugarRepository {
  getById(id: number): Promise<Lugar | null>;
  list(): Promise<Lugar[]>;
  create(lugar: NewLugar): Promise<number>;
  update(id: number, lugar: NewLugar): Promise<void>;
  delete(id: number): Promise<void>;

  addImage(image: Omit<LugarImage, 'id'>): Promise<number>;
  deleteImage(lugarId: number, imageId: number): Promise<void>;
  getImages(lugarId: number): Promise<LugarImage[]>;

  addTag(lugarId: number, tagId: number): Promise<void>;
  removeTag(lugarId: number, tagId: number): Promise<void>;
  getTags(lugarId: number): Promise<NamedEntity[]>;

  addRamo(lugarId: number, ramoId: number): Promise<void>;
  removeRamo(lugarId: number, ramoId: number): Promise<void>;
  getRamos(lugarId: number): Promise<NamedEntity[]>;

  addRating(rating: Omit<LugarRating, 'id'>): Promise<LugarRating>;
  updateRating(lugarId: number, ratingId: number, rating: number, date: Date): Promise<LugarRating>;
  deleteRating(lugarId: number, ratingId: number): Promise<void>;
  getRatings(lugarId: number): Promise<LugarRating[]>;
}

export class PostgresLugarRepository implements LugarRepository {
  constructor(private readonly db: Queryable) {}

  async getById(id: number): Promise<Lugar | null> {
    let row: LugarRow | undefined;
    try {
      const result = await this.db.query<LugarRow>(`${LUGAR_SELECT} WHERE l.id = $1`, [id]);
      row = result.rows[0];
    } catch (error) {
      throw databaseError('getting lugar by ID', error);
    }

    if (!row) {
      return null;
    }
    return this.withRelations(toLugar(row));
  }

  async list(): Promise<Lugar[]> {
    let rows: LugarRow[];
    try {
      const result = await this.db.query<LugarRow>(`${LUGAR_SELECT} ORDER BY l.id`);
      rows = result.rows;
    } catch (error) {
      throw databaseError('listing lugares', error);
    }

    const lugares: Lugar[] = [];
    for (const row of rows) {
      lugares.push(await this.withRelations(toLugar(row)));
    }
    return lugares;
  }

  async create(lugar: NewLugar): Promise<number> {
    try {
      const result = await this.db.query<{ id: number }>(
        `INSERT INTO lugares (
           nome_local, nome_dono_local, telefone_para_contato,
           link_google_maps, link_site, endereco_completo,
           local_publico, valor_fixo, valor_individual,
           user_id, created_at, updated_at
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
         RETURNING id`,
        [
          lugar.nomeLocal,
          lugar.nomeDonoLocal,
          lugar.telefoneParaContato,
          lugar.linkGoogleMaps,
          lugar.linkSite,
          lugar.enderecoCompleto,
          lugar.localPublico,
          lugar.valorFixo,
          lugar.valorIndividual,
          lugar.userId,
          lugar.createdAt,
          lugar.updatedAt,
        ]
      );
      return result.rows[0].id;
    } catch (error) {
      throw databaseError('creating lugar', error);
    }
  }

  async update(id: number, lugar: NewLugar): Promise<void> {
    let rowCount: number | null;
    try {
      const result = await this.db.query(
        `UPDATE lugares
         SET nome_local = $1, nome_dono_local = $2, telefone_para_contato = $3,
             link_google_maps = $4, link_site = $5, endereco_completo = $6,
             local_publico = $7, valor_fixo = $8, valor_individual = $9,
             user_id = $10, updated_at = $11
         WHERE id = $12`,
        [
          lugar.nomeLocal,
          lugar.nomeDonoLocal,
          lugar.telefoneParaContato,
          lugar.linkGoogleMaps,
          lugar.linkSite,
          lugar.enderecoCompleto,
          lugar.localPublico,
          lugar.valorFixo,
          lugar.valorIndividual,
          lugar.userId,
          lugar.updatedAt,
          id,
        ]
      );
      rowCount = result.rowCount;
    } catch (error) {
      throw databaseError('updating lugar', error);
    }

    if (!rowCount) {
      throw new NotFoundError('lugar', id);
    }
  }

  async delete(id: number): Promise<void> {
    await this.deleteOne('DELETE FROM lugares WHERE id = $1', [id], 'deleting lugar', 'lugar', id);
  }

  async addImage(image: Omit<LugarImage, 'id'>): Promise<number> {
    try {
      const result = await this.db.query<{ id: number }>(
        `INSERT INTO lugares_images (lugar_id, image_url, display_order, created_at)
         VALUES ($1, $2, $3, $4)
         RETURNING id`,
        [image.lugarId, image.imageUrl, image.displayOrder, image.createdAt]
      );
      return result.rows[0].id;
    } catch (error) {
      throw databaseError('adding image to lugar', error);
    }
  }

  async deleteImage(lugarId: number, imageId: number): Promise<void> {
    await this.deleteOne(
      'DELETE FROM lugares_images WHERE id = $1 AND lugar_id = $2',
      [imageId, lugarId],
      'deleting image',
      'image',
      imageId
    );
  }

  async getImages(lugarId: number): Promise<LugarImage[]> {
    try {
      const result = await this.db.query<LugarImageRow>(
        `SELECT id, lugar_id, image_url, display_order, created_at
         FROM lugares_images
         WHERE lugar_id = $1
         ORDER BY display_order`,
        [lugarId]
      );
      return result.rows.map(toLugarImage);
    } catch (error) {
      throw databaseError('getting images for lugar', error);
    }
  }

  async addTag(lugarId: number, tagId: number): Promise<void> {
    await this.execute(
      `INSERT INTO lugares_tags (lugar_id, tag_id)
       VALUES ($1, $2)
       ON CONFLICT (lugar_id, tag_id) DO NOTHING`,
      [lugarId, tagId],
      'adding tag to lugar'
    );
  }

  async removeTag(lugarId: number, tagId: number): Promise<void> {
    await this.execute(
      'DELETE FROM lugares_tags WHERE lugar_id = $1 AND tag_id = $2',
      [lugarId, tagId],
      'removing tag from lugar'
    );
  }

  async getTags(lugarId: number): Promise<NamedEntity[]> {
    try {
      const result = await this.db.query<NamedEntityRow>(
        `SELECT t.id, t.name, t.created_at
         FROM tags_lugares t
         JOIN lugares_tags lt ON t.id = lt.tag_id
         WHERE lt.lugar_id = $1
         ORDER BY t.name`,
        [lugarId]
      );
      return result.rows.map(toNamedEntity);
    } catch (error) {
      throw databaseError('getting tags for lugar', error);
    }
  }

  async addRamo(lugarId: number, ramoId: number): Promise<void> {
    await this.execute(
      `INSERT INTO lugares_ramos (lugar_id, ramo_id)
       VALUES ($1, $2)
       ON CONFLICT (lugar_id, ramo_id) DO NOTHING`,
      [lugarId, ramoId],
      'adding ramo to lugar'
    );
  }

  async removeRamo(lugarId: number, ramoId: number): Promise<void> {
    await this.execute(
      'DELETE FROM lugares_ramos WHERE lugar_id = $1 AND ramo_id = $2',
      [lugarId, ramoId],
      'removing ramo from lugar'
    );
  }

  async getRamos(lugarId: number): Promise<NamedEntity[]> {
    try {
      const result = await this.db.query<NamedEntityRow>(
        `SELECT r.id, r.name, r.created_at
         FROM ramos r
         JOIN lugares_ramos lr ON r.id = lr.ramo_id
         WHERE lr.lugar_id = $1
         ORDER BY r.name`,
        [lugarId]
      );
      return result.rows.map(toNamedEntity);
    } catch (error) {
      throw databaseError('getting ramos for lugar', error);
    }
  }

  /**
   * One rating per (lugar, user); a second rating from the same user replaces the first
   */
  async addRating(rating: Omit<LugarRating, 'id'>): Promise<LugarRating> {
    try {
      const result = await this.db.query<LugarRatingRow>(
        `INSERT INTO lugares_ratings (lugar_id, user_id, rating, date)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (lugar_id, user_id) DO UPDATE
         SET rating = EXCLUDED.rating, date = EXCLUDED.date
         RETURNING ${RATING_COLUMNS}`,
        [rating.lugarId, rating.userId, rating.rating, rating.date]
      );
      return toLugarRating(result.rows[0]);
    } catch (error) {
      throw databaseError('adding rating to lugar', error);
    }
  }

  async updateRating(lugarId: number, ratingId: number, rating: number, date: Date): Promise<LugarRating> {
    let row: LugarRatingRow | undefined;
    try {
      const result = await this.db.query<LugarRatingRow>(
        `UPDATE lugares_ratings
         SET rating = $1, date = $2
         WHERE id = $3 AND lugar_id = $4
         RETURNING ${RATING_COLUMNS}`,
        [rating, date, ratingId, lugarId]
      );
      row = result.rows[0];
    } catch (error) {
      throw databaseError('updating rating', error);
    }

    if (!row) {
      throw new NotFoundError('rating', ratingId);
    }
    return toLugarRating(row);
  }

  async deleteRating(lugarId: number, ratingId: number): Promise<void> {
    await this.deleteOne(
      'DELETE FROM lugares_ratings WHERE id = $1 AND lugar_id = $2',
      [ratingId, lugarId],
      'deleting rating',
      'rating',
      ratingId
    );
  }

  async getRatings(lugarId: number): Promise<LugarRating[]> {
    try {
      const result = await this.db.query<LugarRatingRow>(
        `SELECT ${RATING_COLUMNS}
         FROM lugares_ratings
         WHERE lugar_id = $1
         ORDER BY date DESC`,
        [lugarId]
      );
      return result.rows.map(toLugarRating);
    } catch (error) {
      throw databaseError('getting ratings for lugar', error);
    }
  }

  private async withRelations(lugar: Lugar): Promise<Lugar> {
    return {
      ...lugar,
      images: await this.getImages(lugar.id),
      tags: await this.getTags(lugar.id),
      ramos: await this.getRamos(lugar.id),
    };
  }

  private async execute(sql: string, params: unknown[], operation: string): Promise<void> {
    try {
      await this.db.query(sql, params);
    } catch (error) {
      throw databaseError(operation, error);
    }
  }

  private async deleteOne(
    sql: string,
    params: unknown[],
    operation: string,
    entity: string,
    id: number
  ): Promise<void> {
    let rowCount: number | null;
    try {
      const result = await this.db.query(sql, params);
      rowCount = result.rowCount;
    } catch (error) {
      throw databaseError(operation, error);
    }

    if (!rowCount) {
      throw new NotFoundError(entity, id);
    }
  }
}
