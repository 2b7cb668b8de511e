import { describe, it, expect } from '@jest/globals';
import { AppError, NotFoundError, ValidationError, ConflictError, StoreError } from './AppError.js';

describe('AppError', () => {
  it('constructs with code, statusCode, and message', () => {
    const error = new AppError('INTERNAL_ERROR', 500, 'Something broke');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('AppError');
    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.statusCode).toBe(500);
    expect(error.message).toBe('Something broke');
    expect(error.details).toBeUndefined();
  });

  it('accepts optional details', () => {
    const details = { field: 'username', reason: 'too long' };
    const error = new AppError('VALIDATION_ERROR', 400, 'Bad input', details);

    expect(error.details).toEqual(details);
  });
});

describe('NotFoundError', () => {
  it('has correct defaults', () => {
    const error = new NotFoundError();

    expect(error.name).toBe('NotFoundError');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('Resource not found');
  });

  it('accepts a custom message and details', () => {
    const error = new NotFoundError('Duty not found', { dutyId: 10, dutyType: 'coffee' });

    expect(error).toBeInstanceOf(AppError);
    expect(error.message).toBe('Duty not found');
    expect(error.details).toEqual({ dutyId: 10, dutyType: 'coffee' });
  });
});

describe('ValidationError', () => {
  it('has correct defaults', () => {
    const error = new ValidationError();

    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('Validation failed');
  });
});

describe('ConflictError', () => {
  it('has correct defaults', () => {
    const error = new ConflictError();

    expect(error.name).toBe('ConflictError');
    expect(error.code).toBe('CONFLICT');
    expect(error.statusCode).toBe(409);
    expect(error.message).toBe('Resource conflict');
  });
});

describe('StoreError', () => {
  it('has correct defaults', () => {
    const error = new StoreError();

    expect(error.name).toBe('StoreError');
    expect(error.code).toBe('STORE_ERROR');
    expect(error.statusCode).toBe(500);
    expect(error.message).toBe('Database operation failed');
    expect(error.details).toBeUndefined();
  });

  it('keeps the underlying driver error as cause', () => {
    const driverError = new Error('SQLITE_CANTOPEN: unable to open database file');
    const error = new StoreError('Could not open database', driverError);

    expect(error.cause).toBe(driverError);
    expect(error.message).toBe('Could not open database');
  });
});
