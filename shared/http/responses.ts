import { Response } from 'express';
import { ErrorResponseBody } from '../types/api.types';

export function sendJSON(res: Response, statusCode: number, body: unknown): void {
  res.status(statusCode).json(body);
}

export function sendError(res: Response, statusCode: number, message: string): void {
  const body: ErrorResponseBody = { error: message };
  sendJSON(res, statusCode, body);
}

export function sendNoContent(res: Response): void {
  res.status(204).end();
}
