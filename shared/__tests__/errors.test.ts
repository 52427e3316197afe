/**
 * Unit tests for error classes
 */

import { AppError, AppErrorCodes, toError } from '../errors/AppError';
import { NotFoundError } from '../errors/NotFoundError';
import { UserInputError, UserInputErrorCodes } from '../errors/UserInputError';

describe('Error Classes', () => {
  describe('AppError', () => {
    it('should create error with message, code and context', () => {
      const error = new AppError('Test error', AppErrorCodes.DATABASE_ERROR, { operation: 'listing users' });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('AppError');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('DATABASE_ERROR');
      expect(error.context).toEqual({ operation: 'listing users' });
      expect(error.stack).toContain('Test error');
    });
  });

  describe('UserInputError', () => {
    it('should default to status 400', () => {
      const error = new UserInputError('Invalid user ID: "abc"', UserInputErrorCodes.INVALID_ID, { param: 'id' });

      expect(error).toBeInstanceOf(AppError);
      expect(error.name).toBe('UserInputError');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('INVALID_ID');
      expect(error.context).toEqual({ param: 'id' });
    });

    it('should carry an explicit status', () => {
      const error = new UserInputError('Payload too large', UserInputErrorCodes.INVALID_BODY, undefined, 413);

      expect(error.statusCode).toBe(413);
    });
  });

  describe('NotFoundError', () => {
    it('should name the entity and id', () => {
      const error = new NotFoundError('rating', 30);

      expect(error).toBeInstanceOf(AppError);
      expect(error.message).toBe('rating with ID 30 not found');
      expect(error.code).toBe('NOT_FOUND');
      expect(error.entity).toBe('rating');
      expect(error.id).toBe(30);
    });
  });

  describe('toError', () => {
    it('should pass errors through', () => {
      const error = new Error('boom');

      expect(toError(error)).toBe(error);
    });

    it('should wrap strings', () => {
      expect(toError('boom').message).toBe('boom');
    });

    it('should stringify other values', () => {
      expect(toError({ code: 42 }).message).toBe('{"code":42}');
    });

    it('should fall back to String for values JSON cannot encode', () => {
      expect(toError(BigInt(7)).message).toBe('7');
    });
  });
});
