/**
 * Tooth history domain errors
 *
 * All errors extend the core AppError so the API layer can turn them into
 * safe responses. Messages carry identifiers only, never clinical text.
 */

import { AppError, toError } from '@dentalcore/core';
import type { Logger } from '@dentalcore/core';

export class UnknownStatusError extends AppError {
  public readonly statusId: string;

  constructor(statusId: string) {
    super(`Unknown status '${statusId}'`, 'UNKNOWN_STATUS', 404);
    this.name = 'UnknownStatusError';
    this.statusId = statusId;
  }
}

export class InactiveStatusError extends AppError {
  public readonly statusId: string;

  constructor(statusId: string) {
    super(`Status '${statusId}' is deactivated`, 'INACTIVE_STATUS', 422);
    this.name = 'InactiveStatusError';
    this.statusId = statusId;
  }
}

export class DuplicateStatusError extends AppError {
  public readonly statusId: string;

  constructor(statusId: string) {
    super(`Status '${statusId}' already exists`, 'DUPLICATE_STATUS', 409);
    this.name = 'DuplicateStatusError';
    this.statusId = statusId;
  }
}

export class StatusInUseError extends AppError {
  public readonly statusId: string;
  public readonly references: number;

  constructor(statusId: string, references: number) {
    super(
      `Status '${statusId}' is referenced by ${references} record(s); deactivate it instead`,
      'STATUS_IN_USE',
      409
    );
    this.name = 'StatusInUseError';
    this.statusId = statusId;
    this.references = references;
  }
}

export class InvalidToothNumberError extends AppError {
  public readonly value: unknown;

  constructor(value: unknown) {
    super(
      `Invalid tooth number '${String(value)}': expected 11-18, 21-28, 31-38 or 41-48`,
      'INVALID_TOOTH_NUMBER',
      400
    );
    this.name = 'InvalidToothNumberError';
    this.value = value;
  }
}

export class ChartNotInitializedError extends AppError {
  public readonly patientId: string;
  public readonly examinationId: string;

  constructor(patientId: string, examinationId: string) {
    super(
      `Chart for examination '${examinationId}' has no matching cell`,
      'CHART_NOT_INITIALIZED',
      409
    );
    this.name = 'ChartNotInitializedError';
    this.patientId = patientId;
    this.examinationId = examinationId;
  }
}

/**
 * Opaque wrapper around storage-layer failures
 */
export class PersistenceFailureError extends AppError {
  public readonly operation: string;
  public override readonly cause: Error;

  constructor(operation: string, cause: Error) {
    super(`Persistence failure during ${operation}`, 'PERSISTENCE_FAILURE', 503);
    this.name = 'PersistenceFailureError';
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Run a repository call, wrapping any storage error in PersistenceFailureError
 */
export async function withPersistence<T>(
  logger: Logger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    if (error instanceof PersistenceFailureError) {
      throw error;
    }
    const cause = toError(error);
    logger.error({ err: cause, operation }, 'Repository operation failed');
    throw new PersistenceFailureError(operation, cause);
  }
}
