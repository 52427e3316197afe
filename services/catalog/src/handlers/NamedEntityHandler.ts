/**
 * NamedEntityHandler - CRUD over one lookup catalog (ramos, place tags or song tags)
 */

import { Request, Response } from 'express';
import { AuditLogger, NamedEntity, NamedEntityStore, ResourceHandler, serializeNamedEntity } from '@geav/shared';
import { Catalog, CatalogLabels } from '../catalogs';
import { NamedEntityPayloadSchema } from '../schemas/namedEntitySchemas';

export class NamedEntityHandler extends ResourceHandler {
  private readonly labels: CatalogLabels;

  constructor(
    private readonly store: NamedEntityStore,
    audit: AuditLogger,
    catalog: Catalog
  ) {
    super(audit, catalog.table);
    this.labels = catalog.labels;
  }

  async get(req: Request, res: Response): Promise<void> {
    const { entity, title, action } = this.labels;
    const id = await this.pathId(req, res, 'id', entity, this.auditContext(`Get${action}`));
    if (id === null) {
      return;
    }
    const audit = this.auditContext(`Get${action}`, id);

    let found: NamedEntity | null;
    try {
      found = await this.store.getById(id);
    } catch (error) {
      await this.failed(res, `Error getting ${entity}`, error, audit);
      return;
    }

    if (!found) {
      await this.notFound(res, `${title} not found`, audit);
      return;
    }

    await this.succeeded(res, 200, `${title} retrieved successfully`, serializeNamedEntity(found), audit);
  }

  async list(_req: Request, res: Response): Promise<void> {
    const { entity, titlePlural, actionPlural } = this.labels;

    let entities: NamedEntity[];
    try {
      entities = await this.store.list();
    } catch (error) {
      await this.failed(res, `Error listing ${entity}s`, error, this.auditContext(`List${actionPlural}`));
      return;
    }

    await this.succeeded(
      res,
      200,
      `${titlePlural} listed successfully`,
      entities.map(serializeNamedEntity),
      this.auditContext(`List${actionPlural}`, undefined, { count: entities.length })
    );
  }

  async create(req: Request, res: Response): Promise<void> {
    const { entity, title, action } = this.labels;
    const audit = this.auditContext(`Create${action}`);

    const payload = await this.body(NamedEntityPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    const name = payload.name.trim();
    if (name === '') {
      await this.invalid(res, 'Name is required', audit, `Invalid ${entity} data: name is required`);
      return;
    }

    let created: NamedEntity;
    try {
      created = await this.store.create(name);
    } catch (error) {
      await this.failed(res, `Error creating ${entity}`, error, audit);
      return;
    }

    await this.succeeded(
      res,
      201,
      `${title} created successfully`,
      serializeNamedEntity(created),
      this.auditContext(`Create${action}`, created.id)
    );
  }

  async update(req: Request, res: Response): Promise<void> {
    const { entity, title, action } = this.labels;
    const id = await this.pathId(req, res, 'id', entity, this.auditContext(`Update${action}`));
    if (id === null) {
      return;
    }
    const audit = this.auditContext(`Update${action}`, id);

    const payload = await this.body(NamedEntityPayloadSchema, req, res, audit);
    if (!payload) {
      return;
    }

    const name = payload.name.trim();
    if (name === '') {
      await this.invalid(res, 'Name is required', audit, `Invalid ${entity} data: name is required`);
      return;
    }

    let updated: NamedEntity;
    try {
      updated = await this.store.update(id, name);
    } catch (error) {
      await this.failedOrNotFound(res, error, `Error updating ${entity}`, `${title} not found`, audit);
      return;
    }

    await this.succeeded(res, 200, `${title} updated successfully`, serializeNamedEntity(updated), audit);
  }

  async delete(req: Request, res: Response): Promise<void> {
    const { entity, title, action } = this.labels;
    const id = await this.pathId(req, res, 'id', entity, this.auditContext(`Delete${action}`));
    if (id === null) {
      return;
    }
    const audit = this.auditContext(`Delete${action}`, id);

    try {
      await this.store.delete(id);
    } catch (error) {
      await this.failedOrNotFound(res, error, `Error deleting ${entity}`, `${title} not found`, audit);
      return;
    }

    await this.succeededWithoutContent(res, `${title} deleted successfully`, audit);
  }
}
