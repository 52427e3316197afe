/**
 * UserInputError - a path parameter or body the caller got wrong (4xx)
 */

import { AppError } from './AppError';

export class UserInputError extends AppError {
  public readonly statusCode: number;

  constructor(message: string, code: string, context?: Record<string, unknown>, statusCode: number = 400) {
    super(message, code, context);
    this.name = 'UserInputError';
    this.statusCode = statusCode;
  }
}

export const UserInputErrorCodes = {
  INVALID_ID: 'INVALID_ID',
  INVALID_BODY: 'INVALID_BODY',
} as const;
