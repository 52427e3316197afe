/**
 * Base AppError class
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export const AppErrorCodes = {
  DATABASE_ERROR: 'DATABASE_ERROR',
  INVALID_TABLE_NAME: 'INVALID_TABLE_NAME',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}
