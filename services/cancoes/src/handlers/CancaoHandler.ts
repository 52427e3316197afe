/**
 * CancaoHandler - /cancoes endpoints
 */

import { Request, Response } from 'express';
import { AuditContext, AuditLogger, ResourceHandler, requestContextOf } from '@geav/shared';
import { Cancao, CancaoFields, NewCancao, serializeCancao } from '../models/Cancao';
import { CancaoRepository } from '../repositories/CancaoRepository';
import {
  CancaoPayload,
  CancaoPayloadSchema,
  RamoLinkPayloadSchema,
  TagLinkPayloadSchema,
} from '../schemas/cancaoSchemas';

export class CancaoHandler extends ResourceHandler {
  constructor(
    private readonly cancoes: CancaoRepository,
    audit: AuditLogger
  ) {
    super(audit, 'cancoes');
  }

  async getCancao(req: Request, res: Response): Promise<void> {
    const cancaoId = await this.cancaoId(req, res, 'GetCancao');
    if (cancaoId === null) {
      return;
    }
    const audit = this.auditContext('GetCancao', cancaoId);

    let cancao: Cancao | null;
    try {
      cancao = await this.cancoes.getById(cancaoId);
    } catch (error) {
      await this.failed(res, 'Error getting cancao', error, audit);
      return;
    }

    if (!cancao) {
      await this.notFound(res, 'Cancao not found', audit);
      return;
    }

    await this.succeeded(res, 200, 'Cancao retrieved successfully', serializeCancao(cancao), audit);
  }

  async listCancoes(_req: Request, res: Response): Promise<void> {
    let cancoes: Cancao[];
    try {
      cancoes = await this.cancoes.list();
    } catch (error) {
      await this.failed(res, 'Error listing cancoes', error, this.auditContext('ListCancoes'));
      return;
    }

    await this.succeeded(
      res,
      200,
      'Cancoes listed successfully',
      cancoes.map(serializeCancao),
      this.auditContext('ListCancoes', undefined, { count: cancoes.length })
    );
  }

  /**
   * Creates the cancao, then links the tags and ramos sent with it.
   * A link that fails is audited and the rest still run.
   */
  async createCancao(req: Request, res: Response): Promise<void> {
    const audit = this.auditContext('CreateCancao');
    const payload = await this.body(CancaoPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    if (payload.nome === '') {
      await this.invalid(res, 'Nome is required', audit, 'Invalid cancao data: nome is required');
      return;
    }

    const now = new Date();
    const newCancao: NewCancao = {
      ...this.fieldsFrom(payload, payload.user_id || (requestContextOf(res).userId ?? 0)),
      createdAt: now,
      updatedAt: now,
    };

    let cancaoId: number;
    try {
      cancaoId = await this.cancoes.create(newCancao);
    } catch (error) {
      await this.failed(res, 'Error creating cancao', error, audit);
      return;
    }
    const created = this.auditContext('CreateCancao', cancaoId);

    for (const tag of payload.tags) {
      try {
        await this.cancoes.addTag(cancaoId, tag.id);
      } catch (error) {
        await this.reportFailure(res, 'Error adding tag to cancao', error, this.withExtra(created, { tag_id: tag.id }));
      }
    }

    for (const ramo of payload.ramos) {
      try {
        await this.cancoes.addRamo(cancaoId, ramo.id);
      } catch (error) {
        await this.reportFailure(
          res,
          'Error adding ramo to cancao',
          error,
          this.withExtra(created, { ramo_id: ramo.id })
        );
      }
    }

    const cancao = await this.reload(res, cancaoId, created);
    const body: Cancao = cancao ?? { ...newCancao, id: cancaoId, tags: [], ramos: [] };

    await this.succeeded(res, 201, 'Cancao created successfully', serializeCancao(body), created);
  }

  async updateCancao(req: Request, res: Response): Promise<void> {
    const cancaoId = await this.cancaoId(req, res, 'UpdateCancao');
    if (cancaoId === null) {
      return;
    }
    const audit = this.auditContext('UpdateCancao', cancaoId);

    let existing: Cancao | null;
    try {
      existing = await this.cancoes.getById(cancaoId);
    } catch (error) {
      await this.failed(res, 'Error getting cancao', error, audit);
      return;
    }

    if (!existing) {
      await this.notFound(res, 'Cancao not found', audit);
      return;
    }

    const payload = await this.body(CancaoPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    if (payload.nome === '') {
      await this.invalid(res, 'Nome is required', audit, 'Invalid cancao data: nome is required');
      return;
    }

    const updated: Cancao = {
      ...existing,
      ...this.fieldsFrom(payload, payload.user_id),
      updatedAt: new Date(),
    };

    try {
      await this.cancoes.update(cancaoId, updated);
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error updating cancao', 'Cancao not found', audit);
      return;
    }

    await this.succeeded(res, 200, 'Cancao updated successfully', serializeCancao(updated), audit);
  }

  async deleteCancao(req: Request, res: Response): Promise<void> {
    const cancaoId = await this.cancaoId(req, res, 'DeleteCancao');
    if (cancaoId === null) {
      return;
    }
    const audit = this.auditContext('DeleteCancao', cancaoId);

    try {
      await this.cancoes.delete(cancaoId);
    } catch (error) {
      await this.failedOrNotFound(res, error, 'Error deleting cancao', 'Cancao not found', audit);
      return;
    }

    await this.succeededWithoutContent(res, 'Cancao deleted successfully', audit);
  }

  async addTag(req: Request, res: Response): Promise<void> {
    const cancaoId = await this.cancaoId(req, res, 'AddTagToCancao');
    if (cancaoId === null) {
      return;
    }
    const audit = this.auditContext('AddTagToCancao', cancaoId);

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
      await this.cancoes.addTag(cancaoId, payload.tag_id);
    } catch (error) {
      await this.failed(res, 'Error adding tag to cancao', error, tagAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Tag added to cancao successfully', tagAudit);
  }

  async removeTag(req: Request, res: Response): Promise<void> {
    const cancaoId = await this.cancaoId(req, res, 'RemoveTagFromCancao');
    if (cancaoId === null) {
      return;
    }
    const audit = this.auditContext('RemoveTagFromCancao', cancaoId);

    const tagId = await this.pathId(req, res, 'tagId', 'tag', audit);
    if (tagId === null) {
      return;
    }
    const tagAudit = this.withExtra(audit, { tag_id: tagId });

    try {
      await this.cancoes.removeTag(cancaoId, tagId);
    } catch (error) {
      await this.failed(res, 'Error removing tag from cancao', error, tagAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Tag removed from cancao successfully', tagAudit);
  }

  async addRamo(req: Request, res: Response): Promise<void> {
    const cancaoId = await this.cancaoId(req, res, 'AddRamoToCancao');
    if (cancaoId === null) {
      return;
    }
    const audit = this.auditContext('AddRamoToCancao', cancaoId);

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
      await this.cancoes.addRamo(cancaoId, payload.ramo_id);
    } catch (error) {
      await this.failed(res, 'Error adding ramo to cancao', error, ramoAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Ramo added to cancao successfully', ramoAudit);
  }

  async removeRamo(req: Request, res: Response): Promise<void> {
    const cancaoId = await this.cancaoId(req, res, 'RemoveRamoFromCancao');
    if (cancaoId === null) {
      return;
    }
    const audit = this.auditContext('RemoveRamoFromCancao', cancaoId);

    const ramoId = await this.pathId(req, res, 'ramoId', 'ramo', audit);
    if (ramoId === null) {
      return;
    }
    const ramoAudit = this.withExtra(audit, { ramo_id: ramoId });

    try {
      await this.cancoes.removeRamo(cancaoId, ramoId);
    } catch (error) {
      await this.failed(res, 'Error removing ramo from cancao', error, ramoAudit);
      return;
    }

    await this.succeededWithoutContent(res, 'Ramo removed from cancao successfully', ramoAudit);
  }

  private cancaoId(req: Request, res: Response, action: string): Promise<number | null> {
    return this.pathId(req, res, 'id', 'cancao', this.auditContext(action));
  }

  private fieldsFrom(payload: CancaoPayload, userId: number): CancaoFields {
    return {
      nome: payload.nome,
      linkYoutube: payload.link_youtube,
      letra: payload.letra,
      userId,
    };
  }

  private async reload(res: Response, cancaoId: number, audit: AuditContext): Promise<Cancao | null> {
    try {
      return await this.cancoes.getById(cancaoId);
    } catch (error) {
      await this.reportFailure(res, 'Error getting cancao', error, audit);
      return null;
    }
  }
}
