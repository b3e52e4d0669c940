import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  NotFoundError,
  DatabaseConfigError,
  RepositoryError,
  isOperationalError,
  toError,
} from '../errors.js';

describe('AppError', () => {
  it('should create error with correct properties', () => {
    const error = new AppError('Test error', 'TEST_CODE', 400);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
  });

  it('should default to 500 status code', () => {
    const error = new AppError('Test', 'CODE');
    expect(error.statusCode).toBe(500);
  });

  it('should produce safe error details', () => {
    const error = new AppError('Chart missing', 'CODE', 409);

    expect(error.toSafeError()).toEqual({ code: 'CODE', message: 'Chart missing', statusCode: 409 });
  });
});

describe('ValidationError', () => {
  it('should have 400 status code and keep details', () => {
    const details = { field: 'date', message: 'invalid' };
    const error = new ValidationError('Invalid input', details);

    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.details).toBe(details);
  });
});

describe('NotFoundError', () => {
  it('should format the resource name', () => {
    const error = new NotFoundError('Examination');
    expect(error.message).toBe('Examination not found');
    expect(error.statusCode).toBe(404);
  });
});

describe('Database errors', () => {
  it('should record the repository on config errors', () => {
    const error = new DatabaseConfigError('PostgresChartRepository');
    expect(error.repository).toBe('PostgresChartRepository');
    expect(error.code).toBe('DATABASE_CONFIG_ERROR');
  });

  it('should keep the original error on repository errors', () => {
    const cause = new Error('connection reset');
    const error = new RepositoryError('PostgresToothHistoryRepository', 'append', 'Append failed', cause);

    expect(error.repository).toBe('PostgresToothHistoryRepository');
    expect(error.operation).toBe('append');
    expect(error.originalError).toBe(cause);
  });
});

describe('isOperationalError', () => {
  it('should recognize AppError subclasses', () => {
    expect(isOperationalError(new ValidationError('bad'))).toBe(true);
  });

  it('should reject plain errors and non-errors', () => {
    expect(isOperationalError(new Error('boom'))).toBe(false);
    expect(isOperationalError('boom')).toBe(false);
  });
});

describe('toError', () => {
  it('should return Error instances unchanged', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
  });

  it('should wrap other values', () => {
    expect(toError(42).message).toBe('42');
  });
});
