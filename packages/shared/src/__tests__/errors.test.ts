import { describe, it, expect } from 'vitest';
import { AppError, ErrorCode } from '../errors';

describe('AppError', () => {
  it('carries code, status and safe metadata', () => {
    const err = new AppError(ErrorCode.NOT_FOUND, 'Article not found', { ref: 'first-post' });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('AppError');
    expect(err.code).toBe(ErrorCode.NOT_FOUND);
    expect(err.httpStatus).toBe(404);
    expect(err.safeMeta).toEqual({ ref: 'first-post' });
  });

  it('maps every code to an HTTP status', () => {
    const statuses = Object.values(ErrorCode).map((code) => [
      code,
      new AppError(code, 'x').httpStatus,
    ]);

    expect(Object.fromEntries(statuses)).toEqual({
      INTERNAL: 500,
      STORAGE: 500,
      NOT_FOUND: 404,
      UNAUTHORIZED: 401,
      FORBIDDEN: 403,
      VALIDATION: 400,
      RATE_LIMITED: 429,
      CONFLICT: 409,
    });
  });

  it('serializes code, message and metadata only', () => {
    const err = new AppError(ErrorCode.CONFLICT, 'Record already exists', { field: 'slug' });

    expect(err.toJSON()).toEqual({ code: 'CONFLICT', message: 'Record already exists', field: 'slug' });
  });

  it('builds validation errors with field issues', () => {
    const err = AppError.validation('Invalid article', [{ path: 'slug', message: 'Required' }]);

    expect(err.httpStatus).toBe(400);
    expect(err.toJSON()).toEqual({
      code: 'VALIDATION',
      message: 'Invalid article',
      issues: [{ path: 'slug', message: 'Required' }],
    });
  });
});
