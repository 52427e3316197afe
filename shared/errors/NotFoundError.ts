/**
 * NotFoundError - a row addressed by id does not exist
 */

import { AppError } from './AppError';

export class NotFoundError extends AppError {
  public readonly entity: string;
  public readonly id: number;

  constructor(entity: string, id: number) {
    super(`${entity} with ID ${id} not found`, 'NOT_FOUND', { entity, id });
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}
