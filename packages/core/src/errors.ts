/**
 * Custom error classes for the application
 * These errors provide safe, non-PHI error messages for API responses
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Database configuration error
 * Thrown when database is not properly configured
 */
export class DatabaseConfigError extends AppError {
  public readonly repository: string;

  constructor(repository: string, message?: string) {
    super(message ?? 'Database connection not configured', 'DATABASE_CONFIG_ERROR', 503);
    this.name = 'DatabaseConfigError';
    this.repository = repository;
  }
}

/**
 * Base repository error
 * Adapters throw this when a query fails or returns an unexpected shape
 */
export class RepositoryError extends AppError {
  public readonly repository: string;
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(repository: string, operation: string, message: string, originalError?: Error) {
    super(message, 'REPOSITORY_ERROR', 500);
    this.name = 'RepositoryError';
    this.repository = repository;
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
