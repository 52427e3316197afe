/**
 * LugarHandler - /lugares endpoints
 *
 * Covers the lugar itself plus its images, tag and ramo links and ratings.
 * Creating a lugar also attaches the images, tags and ramos sent with it;
 * an attachment that fails is audited and skipped.
 */

import { Request, Response } from 'express';
import { AuditContext, AuditLogger, ResourceHandler, requestContextOf } from '@geav/shared';
import {
  Lugar,
  LugarFields,
  LugarImage,
  LugarRating,
  NewLugar,
  isValidRating,
  serializeLugar,
  serializeLugarImage,
  serializeLugarRating,
} from '../models/Lugar';
import { LugarRepository } from '../repositories/LugarRepository';
import {
  LugarImagePayloadSchema,
  LugarPayload,
  LugarPayloadSchema,
  RamoLinkPayloadSchema,
  RatingPayloadSchema,
  TagLinkPayloadSchema,
} from '../schemas/lugarSchemas';

export class LugarHandler extends ResourceHandler {
  constructor(
    private readonly lugares: LugarRepository,
    audit: AuditLogger
  ) {
    super(audit, 'lugares');
  }

  async getLugar(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'GetLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('GetLugar', lugarId);

    let lugar: Lugar | null;
    try {
      lugar = await this.lugares.getById(lugarId);
    } catch (error) {
      await this.failed(res, 'Error getting lugar', error, audit);
      return;
    }

    if (!lugar) {
      await this.notFound(res, 'Lugar not found', audit);
      return;
    }

    await this.succeeded(res, 200, 'Lugar retrieved successfully', serializeLugar(lugar), audit);
  }

  async listLugares(_req: Request, res: Response): Promise<void> {
    let lugares: Lugar[];
    try {
      lugares = await this.lugares.list();
    } catch (error) {
      await this.failed(res, 'Error listing lugares', error, this.auditContext('ListLugares'));
      return;
    }

    await this.succeeded(
      res,
      200,
      'Lugares listed successfully',
      lugares.map(serializeLugar),
      this.auditContext('ListLugares', undefined, { count: lugares.length })
    );
  }

  async createLugar(req: Request, res: Response): Promise<void> {
    const audit = this.auditContext('CreateLugar');
    const payload = await this.body(LugarPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    if (payload.nome_local === '') {
      await this.invalid(res, 'Nome local is required', audit, 'Invalid lugar data: nome_local is required');
      return;
    }

    const now = new Date();
    const fields = this.fieldsFrom(payload, payload.user_id || (requestContextOf(res).userId ?? 0));
    const newLugar: NewLugar = { ...fields, createdAt: now, updatedAt: now };

    let lugarId: number;
    try {
      lugarId = await this.lugares.create(newLugar);
    } catch (error) {
      await this.failed(res, 'Error creating lugar', error, audit);
      return;
    }
    const created = this.auditContext('CreateLugar', lugarId);

    for (const image of payload.images) {
      try {
        await this.lugares.addImage({
          lugarId,
          imageUrl: image.image_url,
          displayOrder: image.display_order,
          createdAt: now,
        });
      } catch (error) {
        await this.reportFailure(res, 'Error adding image to lugar', error, created);
      }
    }

    for (const tag of payload.tags) {
      try {
        await this.lugares.addTag(lugarId, tag.id);
      } catch (error) {
        await this.reportFailure(
          res,
          'Error adding tag to lugar',
          error,
          this.withExtra(created, { tag_id: tag.id })
        );
      }
    }

    for (const ramo of payload.ramos) {
      try {
        await this.lugares.addRamo(lugarId, ramo.id);
      } catch (error) {
        await this.reportFailure(
          res,
          'Error adding ramo to lugar',
          error,
          this.withExtra(created, { ramo_id: ramo.id })
        );
      }
    }

    const lugar = await this.reload(res, lugarId, created);
    const body: Lugar = lugar ?? {
      ...newLugar,
      id: lugarId,
      images: [],
      tags: [],
      ramos: [],
      averageRating: 0,
      ratingCount: 0,
    };

    await this.succeeded(res, 201, 'Lugar created successfully', serializeLugar(body), created);
  }

  /**
   * Replaces the scalar fields; images, links and ratings are left as they are
   */
  async updateLugar(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'UpdateLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('UpdateLugar', lugarId);

    let existing: Lugar | null;
    try {
      existing = await this.lugares.getById(lugarId);
    } catch (error) {
      await this.failed(res, 'Error getting lugar', error, audit);
      return;
    }

    if (!existing) {
      await this.notFound(res, 'Lugar not found', audit);
      return;
    }

    const payload = await this.body(LugarPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    if (payload.nome_local === '') {
      await this.invalid(res, 'Nome local is required', audit, 'Invalid lugar data: nome_local is required');
      return;
    }

    const updated: Lugar = {
      ...existing,
      ...this.fieldsFrom(payload, payload.user_id),
      updatedAt: new Date(),
    };

    try {
      await this.lugares.update(lugarId, updated);
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error updating lugar', 'Lugar not found', audit);
      return;
    }

    await this.succeeded(res, 200, 'Lugar updated successfully', serializeLugar(updated), audit);
  }

  async deleteLugar(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'DeleteLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('DeleteLugar', lugarId);

    try {
      await this.lugares.delete(lugarId);
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error deleting lugar', 'Lugar not found', audit);
      return;
    }

    await this.succeededWithoutContent(res, 'Lugar deleted successfully', audit);
  }

  async addImage(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'AddImageToLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('AddImageToLugar', lugarId);

    const payload = await this.body(LugarImagePayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    if (payload.image_url === '') {
      await this.invalid(res, 'Image URL is required', audit);
      return;
    }

    const image: LugarImage = {
      id: 0,
      lugarId,
      imageUrl: payload.image_url,
      displayOrder: payload.display_order,
      createdAt: new Date(),
    };

    try {
      image.id = await this.lugares.addImage(image);
    } catch (error) {
      await this.failed(res, 'Error adding image to lugar', error, audit);
      return;
    }

    await this.succeeded(
      res,
      201,
      'Image added to lugar successfully',
      serializeLugarImage(image),
      this.withExtra(audit, { image_id: image.id })
    );
  }

  async deleteImage(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'DeleteImageFromLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('DeleteImageFromLugar', lugarId);

    const imageId = await this.pathId(req, res, 'imageId', 'image', audit);
    if (imageId === null) {
      return;
    }
    const imageAudit = this.withExtra(audit, { image_id: imageId });

    try {
      await this.lugares.deleteImage(lugarId, imageId);
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error deleting image from lugar', 'Image not found', imageAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Image deleted from lugar successfully', imageAudit);
  }

  async addTag(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'AddTagToLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('AddTagToLugar', lugarId);

    const payload = await this.body(TagLinkPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    if (payload.tag_id <= 0) {
      await this.invalid(res, 'Tag ID is required', audit);
      return;
    }
    const tagAudit = this.withExtra(audit, { tag_id: payload.tag_id });

    try {
      await this.lugares.addTag(lugarId, payload.tag_id);
    } catch (error) {
      await this.failed(res, 'Error adding tag to lugar', error, tagAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Tag added to lugar successfully', tagAudit);
  }

  async removeTag(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'RemoveTagFromLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('RemoveTagFromLugar', lugarId);

    const tagId = await this.pathId(req, res, 'tagId', 'tag', audit);
    if (tagId === null) {
      return;
    }
    const tagAudit = this.withExtra(audit, { tag_id: tagId });

    try {
      await this.lugares.removeTag(lugarId, tagId);
    } catch (error) {
      await this.failed(res, 'Error removing tag from lugar', error, tagAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Tag removed from lugar successfully', tagAudit);
  }

  async addRamo(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'AddRamoToLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('AddRamoToLugar', lugarId);

    const payload = await this.body(RamoLinkPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    if (payload.ramo_id <= 0) {
      await this.invalid(res, 'Ramo ID is required', audit);
      return;
    }
    const ramoAudit = this.withExtra(audit, { ramo_id: payload.ramo_id });

    try {
      await this.lugares.addRamo(lugarId, payload.ramo_id);
    } catch (error) {
      await this.failed(res, 'Error adding ramo to lugar', error, ramoAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Ramo added to lugar successfully', ramoAudit);
  }

  async removeRamo(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'RemoveRamoFromLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('RemoveRamoFromLugar', lugarId);

    const ramoId = await this.pathId(req, res, 'ramoId', 'ramo', audit);
    if (ramoId === null) {
      return;
    }
    const ramoAudit = this.withExtra(audit, { ramo_id: ramoId });

    try {
      await this.lugares.removeRamo(lugarId, ramoId);
    } catch (error) {
      await this.failed(res, 'Error removing ramo from lugar', error, ramoAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Ramo removed from lugar successfully', ramoAudit);
  }

  async getRatings(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'GetRatingsForLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('GetRatingsForLugar', lugarId);

    let ratings: LugarRating[];
    try {
      ratings = await this.lugares.getRatings(lugarId);
    } catch (error) {
      await this.failed(res, 'Error getting ratings for lugar', error, audit);
      return;
    }

    await this.succeeded(
      res,
      200,
      'Ratings retrieved for lugar successfully',
      ratings.map(serializeLugarRating),
      this.withExtra(audit, { count: ratings.length })
    );
  }

  /**
   * Rating from the body's user_id, or from the caller when the body has none.
   * A user who already rated this lugar has the rating replaced.
   */
  async addRating(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'AddRatingToLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('AddRatingToLugar', lugarId);

    const payload = await this.body(RatingPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    if (!isValidRating(payload.rating)) {
      await this.invalid(
        res,
        'Rating must be between 1 and 5',
        this.withExtra(audit, { rating: payload.rating }),
        'Invalid rating value'
      );
      return;
    }

    const userId = payload.user_id || (requestContextOf(res).userId ?? 0);
    if (userId <= 0) {
      await this.invalid(res, 'User ID is required', audit);
      return;
    }

    let rating: LugarRating;
    try {
      rating = await this.lugares.addRating({ lugarId, userId, rating: payload.rating, date: new Date() });
    } catch (error) {
      await this.failed(res, 'Error adding rating to lugar', error, audit);
      return;
    }

    await this.succeeded(
      res,
      201,
      'Rating added to lugar successfully',
      serializeLugarRating(rating),
      this.withExtra(audit, { rating_id: rating.id, rating: rating.rating })
    );
  }

  async updateRating(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'UpdateRatingForLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('UpdateRatingForLugar', lugarId);

    const ratingId = await this.pathId(req, res, 'ratingId', 'rating', audit);
    if (ratingId === null) {
      return;
    }
    const ratingAudit = this.withExtra(audit, { rating_id: ratingId });

    const payload = await this.body(RatingPayloadSchema, req, res, ratingAudit);
    if (!payload) {
      return;
    }

    if (!isValidRating(payload.rating)) {
      await this.invalid(
        res,
        'Rating must be between 1 and 5',
        this.withExtra(ratingAudit, { rating: payload.rating }),
        'Invalid rating value'
      );
      return;
    }

    let rating: LugarRating;
    try {
      rating = await this.lugares.updateRating(lugarId, ratingId, payload.rating, new Date());
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error updating rating for lugar', 'Rating not found', ratingAudit);
      return;
    }

    await this.succeeded(
      res,
      200,
      'Rating updated for lugar successfully',
      serializeLugarRating(rating),
      this.withExtra(ratingAudit, { rating: rating.rating })
    );
  }

  async deleteRating(req: Request, res: Response): Promise<void> {
    const lugarId = await this.lugarId(req, res, 'DeleteRatingFromLugar');
    if (lugarId === null) {
      return;
    }
    const audit = this.auditContext('DeleteRatingFromLugar', lugarId);

    const ratingId = await this.pathId(req, res, 'ratingId', 'rating', audit);
    if (ratingId === null) {
      return;
    }
    const ratingAudit = this.withExtra(audit, { rating_id: ratingId });

    try {
      await this.lugares.deleteRating(lugarId, ratingId);
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error deleting rating from lugar', 'Rating not found', ratingAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Rating deleted from lugar successfully', ratingAudit);
  }

  private lugarId(req: Request, res: Response, action: string): Promise<number | null> {
    return this.pathId(req, res, 'id', 'lugar', this.auditContext(action));
  }

  private fieldsFrom(payload: LugarPayload, userId: number): LugarFields {
    return {
      nomeLocal: payload.nome_local,
      nomeDonoLocal: payload.nome_dono_local,
      telefoneParaContato: payload.telefone_para_contato,
      linkGoogleMaps: payload.link_google_maps,
      linkSite: payload.link_site,
      enderecoCompleto: payload.endereco_completo,
      localPublico: payload.local_publico,
      valorFixo: payload.valor_fixo,
      valorIndividual: payload.valor_individual,
      userId,
    };
  }

  /**
   * Read back a lugar just created; a failure here is audited and answered from memory
   */
  private async reload(res: Response, lugarId: number, audit: AuditContext): Promise<Lugar | null> {
    try {
      return await this.lugares.getById(lugarId);
    } catch (error) {
      await this.reportFailure(res, 'Error getting lugar', error, audit);
      return null;
    }
  }
}
